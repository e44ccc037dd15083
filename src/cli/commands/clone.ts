/**
 * `shelf clone <remote> [name]` — Clone a git repository into the projects directory.
 */

import { Command } from 'commander';
import { openLibrary, type CommandContext } from '../context.js';

export interface CloneCommandOptions {
  branch?: string;
  quiet?: boolean;
}

export function createCloneCommand(ctx: CommandContext): Command {
  const cmd = new Command('clone');

  cmd
    .description('Clone a git repository as a new project')
    .argument('<remote>', 'Repository URL')
    .argument('[name]', 'Directory name for the clone')
    .option('-b, --branch <branch>', 'Branch to check out')
    .option('-q, --quiet', "Hide git's output")
    .action(async (remote: string, name: string | undefined, options: CloneCommandOptions) => {
      await handleClone(ctx, remote, name, options);
    });

  return cmd;
}

export async function handleClone(
  ctx: CommandContext,
  remote: string,
  name: string | undefined,
  options: CloneCommandOptions,
): Promise<void> {
  const library = openLibrary(ctx);
  await library.clone({ remote, name, branch: options.branch, quiet: options.quiet }, ctx.launcher);
  ctx.print('Repository has been cloned.');
}
