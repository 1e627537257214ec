import type { Command } from 'commander';
import { z } from 'zod/v4';
import { ANNUAL_YIELD_CEILING_KWH, type ValidMetrics } from '@domain/types/metrics.js';
import { RoiCalculator } from '@domain/services/roi-calculator.js';
import { applyOverrides, loadConfig } from '@infra/config/config-loader.js';
import { ValidationError } from '@shared/lib/errors.js';
import { withCommandContext } from '@cli/utils.js';
import { formatRoiResult } from '@cli/formatters/run-report-formatter.js';

const RoiOptionsSchema = z.object({
  yield: z.coerce.number().min(0).max(ANNUAL_YIELD_CEILING_KWH),
  peak: z.coerce.number().positive().optional(),
  price: z.coerce.number().min(0).optional(),
  panelCost: z.coerce.number().positive().optional(),
  lifetime: z.coerce.number().positive().optional(),
});

/**
 * Register the `solarcalc roi` command: the ROI model on its own, without a
 * browser session.
 */
export function registerRoiCommand(program: Command): void {
  program
    .command('roi')
    .description('Compute profitability from a known annual yield')
    .requiredOption('--yield <kwh>', 'Annual yield in kWh')
    .option('--peak <kw>', 'Installed peak power in kWp (derived from the yield when omitted)')
    .option('--price <per-kwh>', 'Electricity price per kWh')
    .option('--panel-cost <per-kw>', 'Installed cost per kW of panels')
    .option('--lifetime <years>', 'Expected system lifetime in years')
    .action(withCommandContext(async (ctx) => {
      const parsed = RoiOptionsSchema.safeParse(ctx.cmd.opts());
      if (!parsed.success) {
        const summary = parsed.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ValidationError(`Invalid option: ${summary}`, parsed.error.issues);
      }
      const opts = parsed.data;
      const config = applyOverrides(loadConfig(ctx.projectDir), {
        economics: {
          electricityPricePerKwh: opts.price,
          panelCostPerKw: opts.panelCost,
          expectedLifetimeYears: opts.lifetime,
        },
      });

      const metrics: ValidMetrics = {
        valid: true,
        annualYieldKwh: opts.yield,
        matchedBy: 'label',
        ...(opts.peak !== undefined ? { peakPowerKw: opts.peak } : {}),
      };
      const report = RoiCalculator.compute(metrics, config.economics);
      const projection = RoiCalculator.projectSavings(report);

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify({
          ...report,
          paybackYears: Number.isFinite(report.paybackYears) ? report.paybackYears : null,
          projection,
        }, null, 2));
      } else {
        console.log(formatRoiResult(report, projection));
      }
    }, { projectDir: 'optional' }));
}
