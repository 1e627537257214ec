import { mkdirSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import { ConfigNotFoundError } from '@shared/lib/errors.js';
import { exitCodeFor, findProjectDir, handleCommandError, resolveProjectDir, withCommandContext, type CommandContext } from './utils.js';

describe('project directory lookup', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'solarcalc-utils-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  it('finds .solarcalc/ under the working directory', () => {
    mkdirSync(join(cwd, '.solarcalc'));
    expect(resolveProjectDir(cwd)).toBe(join(cwd, '.solarcalc'));
    expect(findProjectDir(cwd)).toBe(join(cwd, '.solarcalc'));
  });

  it('reports a missing project', () => {
    expect(() => resolveProjectDir(cwd)).toThrow(ConfigNotFoundError);
    expect(findProjectDir(cwd)).toBeNull();
  });
});

describe('exitCodeFor', () => {
  it('maps terminal states to exit statuses', () => {
    expect(exitCodeFor('Completed')).toBe(0);
    expect(exitCodeFor('PartiallyCompleted')).toBe(1);
    expect(exitCodeFor('Failed')).toBe(2);
  });
});

describe('withCommandContext', () => {
  let errors: string[];

  beforeEach(() => {
    errors = [];
    vi.spyOn(console, 'error').mockImplementation((message: unknown) => {
      errors.push(String(message));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  function commandWith(action: (...args: unknown[]) => Promise<void>): Command {
    const program = new Command().option('--json').option('--verbose').option('--cwd <path>');
    program.command('echo').argument('[value]').action(action);
    return program;
  }

  it('passes global options and positional arguments to the handler', async () => {
    const seen: Array<[CommandContext['globalOpts'], CommandContext['projectDir'], unknown]> = [];
    const action = withCommandContext(
      async (ctx, value) => {
        seen.push([ctx.globalOpts, ctx.projectDir, value]);
      },
      { projectDir: 'none' },
    );

    await commandWith(action).parseAsync(['node', 'solarcalc', '--json', 'echo', 'x']);

    expect(seen).toEqual([[{ json: true, verbose: false }, null, 'x']]);
  });

  it('prints errors and sets the configured exit status', async () => {
    const action = withCommandContext(
      async () => {
        throw new Error('boom');
      },
      { projectDir: 'none', errorExitCode: 2 },
    );

    await commandWith(action).parseAsync(['node', 'solarcalc', 'echo']);

    expect(errors).toEqual(['Error: boom']);
    expect(process.exitCode).toBe(2);
  });

  it('fails commands that need a project outside one', async () => {
    const cwd = mkdtempSync(join(tmpdir(), 'solarcalc-utils-'));
    const handler = vi.fn();
    try {
      await commandWith(withCommandContext(handler)).parseAsync(['node', 'solarcalc', '--cwd', cwd, 'echo']);
    } finally {
      rmSync(cwd, { recursive: true, force: true });
    }

    expect(handler).not.toHaveBeenCalled();
    expect(errors[0]).toBe(
      `Error: No .solarcalc/ directory found at ${join(cwd, '.solarcalc')}. Run "solarcalc init" to initialize your project.`,
    );
    expect(process.exitCode).toBe(1);
  });
});

describe('handleCommandError', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('adds the stack when verbose', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const err = new Error('bad');
    handleCommandError(err, true);
    expect(error).toHaveBeenNthCalledWith(1, 'Error: bad');
    expect(error).toHaveBeenNthCalledWith(2, err.stack);
    expect(process.exitCode).toBe(1);
  });
});
