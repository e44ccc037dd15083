/**
 * `shelf config` — Inspect and reset the configuration file.
 */

import { Command } from 'commander';
import { ConfigError } from '../../core/errors.js';
import type { CommandContext } from '../context.js';
import { editFile } from '../editor.js';

export function createConfigCommand(ctx: CommandContext): Command {
  const cmd = new Command('config');
  cmd.alias('c').description('Manage configuration');

  cmd
    .command('path')
    .description('Print the configuration file location')
    .action(() => {
      ctx.print(ctx.config.getConfigPath());
    });

  cmd
    .command('edit')
    .description('Open the configuration file in your editor')
    .action(async () => {
      await editFile(ctx, ctx.config.getConfigPath());
    });

  cmd
    .command('recent')
    .description('Print the recent project')
    .option('--clear', 'Forget the recent project')
    .action((options: { clear?: boolean }) => {
      handleRecent(ctx, options);
    });

  cmd
    .command('reset')
    .description('Restore the default configuration')
    .action(async () => {
      await handleReset(ctx);
    });

  return cmd;
}

export function handleRecent(ctx: CommandContext, options: { clear?: boolean }): void {
  const config = ctx.config.get();
  if (!config.recent.enabled) {
    throw new ConfigError('Recent project tracking is disabled in the configuration file');
  }

  if (options.clear) {
    if (!config.recent.recentProject) {
      throw new ConfigError('Nothing to clear');
    }
    ctx.config.save({ ...config, recent: { ...config.recent, recentProject: '' } });
    ctx.print('Cleared.');
    return;
  }

  if (!config.recent.recentProject) {
    throw new ConfigError('No recent project found');
  }
  ctx.print(config.recent.recentProject);
}

export async function handleReset(ctx: CommandContext): Promise<void> {
  if (!(await ctx.confirm('Reset your current configuration?', false))) {
    ctx.print('Aborted.');
    return;
  }

  ctx.config.reset();
  ctx.print('Reset.');
}
