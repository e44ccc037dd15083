/**
 * `shelf list` — List projects in the projects directory.
 */

import { Command } from 'commander';
import { openLibrary, type CommandContext } from '../context.js';
import { formatTitle } from '../terminal.js';

export function createListCommand(ctx: CommandContext): Command {
  const cmd = new Command('list');

  cmd
    .alias('ls')
    .description('List your projects')
    .option('--pure', 'Print names only, one per line')
    .action((options: { pure?: boolean }) => {
      handleList(ctx, options);
    });

  return cmd;
}

export function handleList(ctx: CommandContext, options: { pure?: boolean }): void {
  const library = openLibrary(ctx);

  if (library.isEmpty()) {
    ctx.print('No projects found.');
    return;
  }

  if (options.pure) {
    for (const name of library.getNames()) {
      ctx.print(name);
    }
    return;
  }

  const { recent } = ctx.config.get();
  for (const line of formatTitle('Your projects')) {
    ctx.print(line);
  }
  for (const name of library.getNames()) {
    const marker = recent.enabled && name === recent.recentProject ? ' (recent)' : '';
    ctx.print(` ${name}${marker}`);
  }
}
