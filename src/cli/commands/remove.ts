/**
 * `shelf remove <name>` — Delete a project directory and everything in it.
 */

import { Command } from 'commander';
import { LibraryError } from '../../core/errors.js';
import { openLibrary, resolveName, type CommandContext } from '../context.js';

export function createRemoveCommand(ctx: CommandContext): Command {
  const cmd = new Command('remove');

  cmd
    .alias('rm')
    .description('Remove a project (destructive)')
    .argument('<name>', "Project name, or '-' for the recent project")
    .option('-f, --force', 'Skip confirmation for non-empty projects')
    .action(async (name: string, options: { force?: boolean }) => {
      await handleRemove(ctx, name, options);
    });

  return cmd;
}

export async function handleRemove(ctx: CommandContext, typed: string, options: { force?: boolean }): Promise<void> {
  const library = openLibrary(ctx);
  const resolved = await resolveName(ctx, library, typed);
  if (!resolved || !library.contains(resolved)) {
    throw LibraryError.notFound('delete', resolved || typed);
  }

  if (
    !options.force
    && !library.isProjectEmpty(resolved)
    && !(await ctx.confirm('The project is not empty. Continue?', false))
  ) {
    ctx.print('Canceled.');
    return;
  }

  library.delete(resolved);
  ctx.print(`Project '${resolved}' has been removed.`);
}
