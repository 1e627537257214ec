import { join } from 'node:path';
import type { Command } from 'commander';
import { z } from 'zod/v4';
import { ReportStore } from '@infra/persistence/report-store.js';
import { SOLARCALC_DIRS } from '@shared/constants/paths.js';
import { ConfigNotFoundError, SolarCalcError } from '@shared/lib/errors.js';
import { withCommandContext, type CommandContext } from '@cli/utils.js';
import {
  formatReportList,
  formatRunReport,
  formatRunReportJson,
  formatRunReportsJson,
} from '@cli/formatters/run-report-formatter.js';

function storeFor(ctx: CommandContext): ReportStore {
  if (!ctx.projectDir) throw new ConfigNotFoundError(join(ctx.globalOpts.cwd ?? process.cwd(), SOLARCALC_DIRS.root));
  return new ReportStore(join(ctx.projectDir, SOLARCALC_DIRS.reports));
}

/**
 * Register the `solarcalc report` command group.
 */
export function registerReportCommands(program: Command): void {
  const report = program.command('report').description('Browse stored run reports');

  report
    .command('list')
    .description('List stored run reports, newest first')
    .action(withCommandContext(async (ctx) => {
      const reports = storeFor(ctx).list();
      console.log(ctx.globalOpts.json ? formatRunReportsJson(reports) : formatReportList(reports));
    }));

  report
    .command('show')
    .description('Show one run report (the latest when no id is given)')
    .argument('[run-id]', 'Run id, or a unique prefix of one')
    .action(withCommandContext(async (ctx, runId) => {
      const store = storeFor(ctx);
      const id = z.string().optional().parse(runId);
      const found = id ? store.get(id) : store.latest();
      if (!found) {
        throw new SolarCalcError('No reports stored yet. Run "solarcalc run <location>" first.');
      }
      console.log(ctx.globalOpts.json ? formatRunReportJson(found) : formatRunReport(found));
    }));
}
