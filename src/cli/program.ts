import { Command } from 'commander';
import { setLoggerOptions } from '@shared/lib/logger.js';
import { registerInitCommand } from './commands/init.js';
import { registerRunCommands } from './commands/run.js';
import { registerReportCommands } from './commands/report.js';
import { registerRoiCommand } from './commands/roi.js';

const VERSION = '0.1.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('solarcalc')
    .description('Solar profitability estimates from a remote browser agent, a yield extractor and an ROI model')
    .version(VERSION)
    .option('--json', 'Output in JSON format')
    .option('--verbose', 'Enable verbose logging')
    .option('--cwd <path>', 'Set working directory');

  // Wire --verbose and --json to logger before any command runs
  program.hook('preAction', (_thisCommand, actionCommand) => {
    const opts = actionCommand.optsWithGlobals();
    setLoggerOptions({ level: opts['verbose'] ? 'debug' : 'info', json: !!opts['json'] });
  });

  registerInitCommand(program);
  registerRunCommands(program);
  registerReportCommands(program);
  registerRoiCommand(program);

  return program;
}
