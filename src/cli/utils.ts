import { join } from 'node:path';
import { existsSync } from 'node:fs';
import { Command } from 'commander';
import { ConfigNotFoundError } from '@shared/lib/errors.js';
import { SOLARCALC_DIRS } from '@shared/constants/paths.js';

/** Exit status of a run command: 0 Completed, 1 PartiallyCompleted, 2 Failed or bad input. */
export const EXIT_CODES = {
  completed: 0,
  partial: 1,
  failed: 2,
} as const;

/**
 * Resolve the .solarcalc/ directory path from a given cwd (or process.cwd()).
 * Throws ConfigNotFoundError if the directory does not exist.
 */
export function resolveProjectDir(cwd?: string): string {
  const dir = join(cwd ?? process.cwd(), SOLARCALC_DIRS.root);
  if (!existsSync(dir)) {
    throw new ConfigNotFoundError(dir);
  }
  return dir;
}

/** Like resolveProjectDir, but null when there is no project. */
export function findProjectDir(cwd?: string): string | null {
  const dir = join(cwd ?? process.cwd(), SOLARCALC_DIRS.root);
  return existsSync(dir) ? dir : null;
}

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  cwd?: string;
}

export interface CommandContext {
  globalOpts: GlobalOptions;
  /** The .solarcalc/ directory, or null when the command runs outside a project. */
  projectDir: string | null;
  cmd: Command;
}

type CommandHandler = (ctx: CommandContext, ...args: unknown[]) => void | Promise<void>;

export interface CommandContextOptions {
  /** `required` (default) fails without .solarcalc/, `optional` passes null, `none` skips the lookup. */
  projectDir?: 'required' | 'optional' | 'none';
  /** Exit status set when the handler throws. Defaults to 1. */
  errorExitCode?: number;
}

/**
 * Extract global CLI options from a Commander command.
 */
export function getGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.optsWithGlobals();
  const cwd: unknown = opts['cwd'];
  return {
    json: !!opts['json'],
    verbose: !!opts['verbose'],
    ...(typeof cwd === 'string' ? { cwd } : {}),
  };
}

/**
 * Wrap a CLI command handler with standard boilerplate:
 * resolves the project dir, extracts global options, catches errors.
 *
 * Commander's .action() callback receives (...positionalArgs, localOpts, cmd).
 * The wrapper strips the last two, passes cmd via context, and forwards positional args.
 */
export function withCommandContext(
  handler: CommandHandler,
  options: CommandContextOptions = {},
): (...args: unknown[]) => Promise<void> {
  return async (...args: unknown[]) => {
    const cmd = args[args.length - 1];
    if (!(cmd instanceof Command)) {
      throw new Error('withCommandContext: the last action argument must be the Command');
    }
    const positionalArgs = args.slice(0, -2);
    const globalOpts = getGlobalOptions(cmd);

    try {
      const mode = options.projectDir ?? 'required';
      const projectDir =
        mode === 'required' ? resolveProjectDir(globalOpts.cwd)
        : mode === 'optional' ? findProjectDir(globalOpts.cwd)
        : null;

      await handler({ globalOpts, projectDir, cmd }, ...positionalArgs);
    } catch (error) {
      handleCommandError(error, globalOpts.verbose, options.errorExitCode);
    }
  };
}

/**
 * Centralized error handler for CLI commands.
 * Prints the error message, and optionally the stack trace if verbose is enabled.
 */
export function handleCommandError(error: unknown, verbose: boolean, exitCode = 1): void {
  console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
  if (verbose && error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = exitCode;
}

export function exitCodeFor(state: string): number {
  if (state === 'Completed') return EXIT_CODES.completed;
  if (state === 'PartiallyCompleted') return EXIT_CODES.partial;
  return EXIT_CODES.failed;
}
