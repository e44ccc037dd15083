/**
 * `shelf rename <old> <new>` — Rename a project directory.
 */

import { Command } from 'commander';
import { openLibrary, type CommandContext } from '../context.js';

export function createRenameCommand(ctx: CommandContext): Command {
  const cmd = new Command('rename');

  cmd
    .alias('mv')
    .description('Rename a project')
    .argument('<old>', 'Current project name')
    .argument('<new>', 'New project name')
    .action((oldName: string, newName: string) => {
      handleRename(ctx, oldName, newName);
    });

  return cmd;
}

export function handleRename(ctx: CommandContext, oldName: string, newName: string): void {
  const library = openLibrary(ctx);
  library.rename(oldName, newName);
  ctx.print(`Project '${oldName}' has been renamed to '${newName}'.`);
}
