/**
 * `shelf new <name>` — Create a project, optionally from a template.
 */

import { Command } from 'commander';
import { TemplateProvisioner } from '../../templates/provisioner.js';
import { loadTemplates, openLibrary, type CommandContext } from '../context.js';
import { formatProgress } from '../terminal.js';

export interface NewOptions {
  template?: string;
  quiet?: boolean;
}

export function createNewCommand(ctx: CommandContext): Command {
  const cmd = new Command('new');

  cmd
    .description('Create a new project')
    .argument('<name>', 'Project name')
    .option('-t, --template <template>', 'Scaffold the project with a template')
    .option('-q, --quiet', "Hide the template commands' output")
    .action(async (name: string, options: NewOptions) => {
      await handleNew(ctx, name, options);
    });

  return cmd;
}

export async function handleNew(ctx: CommandContext, name: string, options: NewOptions): Promise<void> {
  const library = openLibrary(ctx);

  if (!options.template) {
    library.create(name);
    ctx.print('Created.');
    return;
  }

  const profile = ctx.config.getCurrentProfile();
  const provisioner = new TemplateProvisioner({
    library,
    templates: loadTemplates(ctx),
    launcher: ctx.launcher,
  });

  ctx.print(`Generating project '${name}' from '${options.template}' template...`);

  const result = await provisioner.provision({
    projectName: name,
    templateName: options.template,
    profile,
    quiet: options.quiet,
    onCommand: (command, step, total) => ctx.print(formatProgress(command, step, total)),
  });

  ctx.print(`Generated '${name}' in ${result.elapsedMs} ms.`);
}
