/**
 * `shelf profiles` — Editor/shell profiles stored in the configuration.
 */

import { Command } from 'commander';
import { ConfigError, ProfileNotFoundError } from '../../core/errors.js';
import type { Profile } from '../../core/types.js';
import { getShellCommandArgs, isGuiEditor } from '../../utils/platform.js';
import type { CommandContext } from '../context.js';
import { formatTitle } from '../terminal.js';

export function createProfilesCommand(ctx: CommandContext): Command {
  const cmd = new Command('profiles');
  cmd.alias('p').description('Manage editor and shell profiles');

  cmd
    .command('new')
    .description('Create a profile interactively')
    .action(async () => {
      await handleProfilesNew(ctx);
    });

  cmd
    .command('set')
    .description('Switch the current profile')
    .argument('<name>', 'Profile name')
    .action((name: string) => {
      handleProfilesSet(ctx, name);
    });

  cmd
    .command('info')
    .description('Show the programs a profile uses')
    .argument('<name>', 'Profile name')
    .action((name: string) => {
      handleProfilesInfo(ctx, name);
    });

  cmd
    .command('list')
    .description('List profiles')
    .action(() => {
      handleProfilesList(ctx);
    });

  cmd
    .command('remove')
    .description('Remove a profile')
    .argument('<name>', 'Profile name')
    .action(async (name: string) => {
      await handleProfilesRemove(ctx, name);
    });

  return cmd;
}

export async function handleProfilesNew(ctx: CommandContext): Promise<void> {
  const config = ctx.config.get();

  const name = await ctx.ask('Name for the new profile?');
  if (!name) {
    throw new ConfigError('Profile name is empty');
  }
  if (config.profiles[name]) {
    throw new ConfigError(`Profile '${name}' already exists`);
  }

  const editor = await ctx.ask('Which editor do you want to assign (program name)?');
  if (!editor) {
    throw new ConfigError('Editor name is empty');
  }
  const gui = isGuiEditor(editor);
  const editorForkMode = gui || (await ctx.confirm('Do you want to run your editor forked?', false));

  const shell = await ctx.ask('Which shell do you want to assign (program name)?');
  if (!shell) {
    throw new ConfigError('Shell name is empty');
  }

  const profile: Profile = {
    editor,
    editorArgs: gui ? ['.'] : [],
    editorForkMode,
    shell,
    shellArgs: getShellCommandArgs(shell),
  };

  ctx.config.save({ ...config, profiles: { ...config.profiles, [name]: profile } });
  ctx.print('Your profile has been saved. You can edit it in your configuration file.');
}

export function handleProfilesSet(ctx: CommandContext, name: string): void {
  const config = ctx.config.get();
  if (!config.profiles[name]) {
    throw new ProfileNotFoundError(name);
  }

  ctx.config.save({ ...config, options: { ...config.options, currentProfile: name } });
  ctx.print(`Switched current profile to '${name}'.`);
}

export function handleProfilesInfo(ctx: CommandContext, name: string): void {
  const profile = ctx.config.getProfile(name);

  for (const line of formatTitle('Profile')) ctx.print(line);
  ctx.print(` Editor: ${[profile.editor, ...profile.editorArgs].join(' ')}${profile.editorForkMode ? ' (forked)' : ''}`);
  ctx.print(` Shell: ${[profile.shell, ...profile.shellArgs].join(' ')}`);
}

export function handleProfilesList(ctx: CommandContext): void {
  const config = ctx.config.get();

  for (const line of formatTitle('Your profiles')) ctx.print(line);
  for (const name of Object.keys(config.profiles)) {
    ctx.print(` ${name}${name === config.options.currentProfile ? ' (current)' : ''}`);
  }
}

export async function handleProfilesRemove(ctx: CommandContext, name: string): Promise<void> {
  const config = ctx.config.get();
  if (!config.profiles[name]) {
    throw new ProfileNotFoundError(name);
  }
  if (name === config.options.currentProfile) {
    throw new ConfigError(`Profile '${name}' is in use; switch to another profile first`);
  }

  if (!(await ctx.confirm('Do you want to delete this profile?', false))) {
    ctx.print('Aborted.');
    return;
  }

  const profiles = Object.fromEntries(Object.entries(config.profiles).filter(([key]) => key !== name));
  ctx.config.save({ ...config, profiles });
  ctx.print('Removed.');
}
