/**
 * `shelf templates` — Manage command templates used by `shelf new -t`.
 */

import { Command } from 'commander';
import { TemplateError } from '../../core/errors.js';
import { parseTemplateCommands } from '../../templates/registry.js';
import { loadTemplates, type CommandContext } from '../context.js';
import { editFile, editScratch } from '../editor.js';
import { formatTitle } from '../terminal.js';

export const TEMPLATE_BUFFER_HEADER = '# Write your commands here, one per line. They will be added to the template.\n';

export function createTemplatesCommand(ctx: CommandContext): Command {
  const cmd = new Command('templates');
  cmd.alias('t').description('Manage project templates');

  cmd
    .command('new')
    .description('Create a template by writing its commands in your editor')
    .argument('<name>', 'Template name')
    .action(async (name: string) => {
      await handleTemplatesNew(ctx, name);
    });

  cmd
    .command('list')
    .description('List templates')
    .option('--pure', 'Print names only, one per line')
    .action((options: { pure?: boolean }) => {
      handleTemplatesList(ctx, options);
    });

  cmd
    .command('get')
    .description('Print the commands of a template')
    .argument('<name>', 'Template name')
    .option('--pure', 'Print commands only, one per line')
    .action((name: string, options: { pure?: boolean }) => {
      handleTemplatesGet(ctx, name, options);
    });

  cmd
    .command('edit')
    .description('Open the templates file in your editor')
    .action(async () => {
      await editFile(ctx, loadTemplates(ctx).getPath());
    });

  cmd
    .command('path')
    .description('Print the templates file location')
    .action(() => {
      ctx.print(loadTemplates(ctx).getPath());
    });

  cmd
    .command('remove')
    .description('Remove a template')
    .argument('<name>', 'Template name')
    .action((name: string) => {
      handleTemplatesRemove(ctx, name);
    });

  cmd
    .command('clear')
    .description('Remove all templates')
    .action(async () => {
      await handleTemplatesClear(ctx);
    });

  return cmd;
}

export async function handleTemplatesNew(ctx: CommandContext, name: string): Promise<void> {
  const registry = loadTemplates(ctx);
  if (registry.has(name)) {
    throw new TemplateError('TEMPLATE_EXISTS', name);
  }

  ctx.print('The editor will launch with an opened file.');
  const commands = parseTemplateCommands(await editScratch(ctx, TEMPLATE_BUFFER_HEADER, `${name}.txt`));

  registry.add(name, commands);
  registry.save();
  ctx.print(`Template '${name}' has been created.`);
}

export function handleTemplatesList(ctx: CommandContext, options: { pure?: boolean }): void {
  const registry = loadTemplates(ctx);
  if (registry.isEmpty()) {
    ctx.print('No templates found.');
    return;
  }

  if (!options.pure) {
    for (const line of formatTitle('Templates')) ctx.print(line);
  }
  for (const name of registry.list()) {
    ctx.print(options.pure ? name : ` ${name}`);
  }
}

export function handleTemplatesGet(ctx: CommandContext, name: string, options: { pure?: boolean }): void {
  const template = loadTemplates(ctx).get(name);
  if (!template) {
    throw new TemplateError('TEMPLATE_NOT_FOUND', name);
  }

  if (!options.pure) {
    for (const line of formatTitle('Commands of this template')) ctx.print(line);
  }
  for (const command of template.commands) {
    ctx.print(options.pure ? command : ` ${command}`);
  }
}

export function handleTemplatesRemove(ctx: CommandContext, name: string): void {
  const registry = loadTemplates(ctx);
  registry.remove(name);
  registry.save();
  ctx.print(`Template '${name}' has been removed.`);
}

export async function handleTemplatesClear(ctx: CommandContext): Promise<void> {
  const registry = loadTemplates(ctx);
  if (!(await ctx.confirm('Clear all templates?', false))) {
    ctx.print('Aborted.');
    return;
  }

  registry.clear();
  registry.save();
  ctx.print('Templates storage has been cleared.');
}
