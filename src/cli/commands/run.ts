import { setTimeout as delay } from 'node:timers/promises';
import type { Command } from 'commander';
import { z } from 'zod/v4';
import type { RunReport } from '@domain/types/run-report.js';
import type { SolarCalcConfig } from '@domain/types/config.js';
import { applyOverrides, loadConfig, readSecrets, type Secrets } from '@infra/config/config-loader.js';
import { createRunner, executeRun } from '@features/workflow-run/run-handler.js';
import { ValidationError } from '@shared/lib/errors.js';
import { logger } from '@shared/lib/logger.js';
import { EXIT_CODES, exitCodeFor, withCommandContext, type CommandContext } from '@cli/utils.js';
import { formatRunReport, formatRunReportJson, formatRunReportsJson } from '@cli/formatters/run-report-formatter.js';

const RunCommandOptionsSchema = z.object({
  price: z.coerce.number().min(0).optional(),
  panelCost: z.coerce.number().positive().optional(),
  lifetime: z.coerce.number().positive().optional(),
  systemSize: z.coerce.number().positive().optional(),
  replay: z.string().min(1).optional(),
  sinks: z.boolean().default(true),
  pause: z.coerce.number().int().min(0).optional(),
});

type RunCommandOptions = z.infer<typeof RunCommandOptionsSchema>;

function parseOptions(cmd: Command): RunCommandOptions {
  const result = RunCommandOptionsSchema.safeParse(cmd.opts());
  if (!result.success) {
    const summary = result.error.issues.map((i) => `--${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ValidationError(`Invalid option: ${summary}`, result.error.issues);
  }
  return result.data;
}

function resolveConfig(ctx: CommandContext, opts: RunCommandOptions): { config: SolarCalcConfig; secrets: Secrets } {
  const config = applyOverrides(loadConfig(ctx.projectDir), {
    economics: {
      electricityPricePerKwh: opts.price,
      panelCostPerKw: opts.panelCost,
      expectedLifetimeYears: opts.lifetime,
    },
    flow: { systemSizeKw: opts.systemSize },
    gateway: opts.replay ? { backend: 'replay', replayFixture: opts.replay } : {},
  });
  return { config, secrets: readSecrets() };
}

function addRunOptions(command: Command): Command {
  return command
    .option('--price <per-kwh>', 'Electricity price per kWh')
    .option('--panel-cost <per-kw>', 'Installed cost per kW of panels')
    .option('--lifetime <years>', 'Expected system lifetime in years')
    .option('--system-size <kw>', 'Peak power to enter in the estimator, in kWp')
    .option('--replay <file>', 'Use the offline backend with a captured results page')
    .option('--no-sinks', 'Skip publishing to dashboards, social and marketplace sinks');
}

function printReport(ctx: CommandContext, report: RunReport, savedTo: string | null): void {
  if (ctx.globalOpts.json) {
    console.log(formatRunReportJson(report));
    return;
  }
  console.log(formatRunReport(report));
  if (savedTo) console.log(`\nReport saved: ${savedTo}`);
}

/**
 * Register the `solarcalc run` and `solarcalc batch` commands.
 */
export function registerRunCommands(program: Command): void {
  addRunOptions(
    program
      .command('run')
      .description('Estimate solar profitability for an address or "lat,lon"')
      .argument('<location>', 'Street address, or coordinates as "lat,lon"'),
  ).action(
    withCommandContext(
      async (ctx, location) => {
        const opts = parseOptions(ctx.cmd);
        const { config, secrets } = resolveConfig(ctx, opts);
        const runner = createRunner({
          cwd: ctx.globalOpts.cwd ?? process.cwd(),
          projectDir: ctx.projectDir,
          config,
          secrets,
          publish: opts.sinks,
        });

        const controller = new AbortController();
        const onSignal = () => {
          logger.warn('Interrupted: stopping after the current step');
          controller.abort();
        };
        process.once('SIGINT', onSignal);
        try {
          const { report, savedTo } = await executeRun(runner, z.string().parse(location), {
            signal: controller.signal,
          });
          printReport(ctx, report, savedTo);
          process.exitCode = exitCodeFor(report.state);
        } finally {
          process.off('SIGINT', onSignal);
        }
      },
      { projectDir: 'optional', errorExitCode: EXIT_CODES.failed },
    ),
  );

  addRunOptions(
    program
      .command('batch')
      .description('Run several locations one after another on the shared browser session')
      .argument('<locations...>', 'Addresses or "lat,lon" pairs')
      .option('--pause <ms>', 'Pause between runs, in milliseconds (default: batch.pauseMs)'),
  ).action(
    withCommandContext(
      async (ctx, locations) => {
        const opts = parseOptions(ctx.cmd);
        const list = z.array(z.string()).min(1).parse(locations);
        const resolved = resolveConfig(ctx, opts);
        const config = applyOverrides(resolved.config, { workflow: { onBusy: 'queue' } });
        const pauseMs = opts.pause ?? config.batch.pauseMs;

        const runner = createRunner({
          cwd: ctx.globalOpts.cwd ?? process.cwd(),
          projectDir: ctx.projectDir,
          config,
          secrets: resolved.secrets,
          publish: opts.sinks,
        });

        const reports: RunReport[] = [];
        let worst: number = EXIT_CODES.completed;
        for (const [i, location] of list.entries()) {
          if (i > 0 && pauseMs > 0) {
            logger.info(`Pausing ${pauseMs}ms before the next run`);
            await delay(pauseMs);
          }
          try {
            const { report, savedTo } = await executeRun(runner, location);
            reports.push(report);
            worst = Math.max(worst, exitCodeFor(report.state));
            if (!ctx.globalOpts.json) {
              printReport(ctx, report, savedTo);
              console.log('');
            }
          } catch (err) {
            if (!(err instanceof ValidationError)) throw err;
            console.error(`Error: ${location}: ${err.message}`);
            worst = EXIT_CODES.failed;
          }
        }

        if (ctx.globalOpts.json) {
          console.log(formatRunReportsJson(reports));
        } else {
          console.log(`Batch finished: ${reports.length}/${list.length} runs, worst exit status ${worst}`);
        }
        process.exitCode = worst;
      },
      { projectDir: 'optional', errorExitCode: EXIT_CODES.failed },
    ),
  );
}
