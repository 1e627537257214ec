import type { Command } from 'commander';
import { z } from 'zod/v4';
import { GatewayBackendType } from '@domain/types/config.js';
import { handleInit } from '@features/init/init-handler.js';
import { withCommandContext } from '@cli/utils.js';

const InitOptionsSchema = z.object({
  backend: GatewayBackendType.optional(),
  baseUrl: z.string().url().optional(),
  skipPrompts: z.boolean().default(false),
  force: z.boolean().default(false),
});

/**
 * Register the `solarcalc init` command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Create .solarcalc/ with a default config.json')
    .option('--backend <name>', 'Browser automation backend: http, replay')
    .option('--base-url <url>', 'Base URL of the remote automation agent')
    .option('--skip-prompts', 'Skip interactive prompts and use defaults')
    .option('--force', 'Overwrite an existing config.json')
    .action(withCommandContext(async (ctx) => {
      const opts = InitOptionsSchema.parse(ctx.cmd.opts());
      const result = await handleInit({
        cwd: ctx.globalOpts.cwd ?? process.cwd(),
        backend: opts.backend,
        baseUrl: opts.baseUrl,
        skipPrompts: opts.skipPrompts || ctx.globalOpts.json,
        force: opts.force,
      });

      if (ctx.globalOpts.json) {
        console.log(JSON.stringify(result, null, 2));
        return;
      }
      console.log(`Initialized ${result.projectDir}`);
      console.log(
        result.configWritten
          ? `  config: ${result.configPath} (gateway backend: ${result.config.gateway.backend})`
          : `  config: ${result.configPath} (kept existing)`,
      );
      console.log('');
      console.log('Next: solarcalc run "<address>"  or  solarcalc run "<lat>,<lon>"');
    }, { projectDir: 'none' }));
}
