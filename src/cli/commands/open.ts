/**
 * `shelf open <name>` — Open a project in the profile's editor or shell.
 * `-` opens the most recent project.
 */

import { Command } from 'commander';
import { ConfigError, LibraryError } from '../../core/errors.js';
import { openLibrary, resolveName, type CommandContext } from '../context.js';

export const SESSION_ENV_VAR = 'SHELF_SESSION';

export interface OpenOptions {
  path?: boolean;
  shell?: boolean;
}

export function createOpenCommand(ctx: CommandContext): Command {
  const cmd = new Command('open');

  cmd
    .description('Open a project in your editor or shell')
    .argument('<name>', "Project name, or '-' for the recent project")
    .option('-p, --path', 'Print the project path instead of opening it')
    .option('-s, --shell', 'Start a shell session inside the project')
    .action(async (name: string, options: OpenOptions) => {
      await handleOpen(ctx, name, options);
    });

  return cmd;
}

export async function handleOpen(ctx: CommandContext, typed: string, options: OpenOptions): Promise<void> {
  const library = openLibrary(ctx);
  const resolved = await resolveName(ctx, library, typed);
  const project = resolved ? library.get(resolved) : undefined;
  if (!project) {
    throw LibraryError.notFound('inspect', resolved || typed);
  }

  if (options.path) {
    ctx.print(project.path);
    return;
  }

  const profile = ctx.config.getCurrentProfile();
  const useShell = options.shell ?? false;
  const program = useShell ? profile.shell : profile.editor;
  const forkMode = useShell ? false : profile.editorForkMode;

  if (!program) {
    throw new ConfigError(`No ${useShell ? 'shell' : 'editor'} is set in the current profile`);
  }

  if (useShell) {
    ctx.print('======== STARTING SHELL SESSION ========');
  }

  await ctx.launcher({
    program,
    args: useShell ? [] : [...profile.editorArgs],
    cwd: project.path,
    env: useShell ? [[SESSION_ENV_VAR, '1']] : undefined,
    quiet: false,
    forkMode,
  });

  if (useShell) {
    ctx.print('========  SHELL SESSION ENDED  ========');
  }

  ctx.config.setRecent(project.name);

  if (forkMode) {
    ctx.print('Editor launched.');
  }
}
