/**
 * CLI Bootstrap
 * Creates and configures the Commander.js CLI application
 */

import { Command } from 'commander';
import { existsSync } from 'fs';
import { createLogger, getLogger, setLogger } from '../core/logger.js';
import { TemplateRegistry } from '../templates/registry.js';
import { getTemplatesPath } from '../utils/platform.js';
import { VERSION, NAME } from '../version.js';
import { createDefaultContext, type CommandContext } from './context.js';
import { createBackupCommand, createImportCommand } from './commands/backup.js';
import { createCloneCommand } from './commands/clone.js';
import { createConfigCommand } from './commands/config.js';
import { createListCommand } from './commands/list.js';
import { createNewCommand } from './commands/new.js';
import { createOpenCommand } from './commands/open.js';
import { createProfilesCommand } from './commands/profiles.js';
import { createRemoveCommand } from './commands/remove.js';
import { createRenameCommand } from './commands/rename.js';
import { createTemplatesCommand } from './commands/templates.js';
import { createZenCommand } from './commands/zen.js';

export function createCLI(ctx: CommandContext = createDefaultContext()): Command {
  const program = new Command();

  program
    .name(NAME)
    .version(VERSION)
    .description('Keep your project directories on one shelf')
    .option('-v, --verbose', 'Enable verbose output')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts<{ verbose?: boolean }>().verbose) {
        setLogger(createLogger(NAME, true));
      }
    });

  // Register commands
  program.addCommand(createNewCommand(ctx));
  program.addCommand(createCloneCommand(ctx));
  program.addCommand(createOpenCommand(ctx));
  program.addCommand(createListCommand(ctx));
  program.addCommand(createRenameCommand(ctx));
  program.addCommand(createRemoveCommand(ctx));
  program.addCommand(createTemplatesCommand(ctx));
  program.addCommand(createConfigCommand(ctx));
  program.addCommand(createProfilesCommand(ctx));
  program.addCommand(createBackupCommand(ctx));
  program.addCommand(createImportCommand(ctx));
  program.addCommand(createZenCommand(ctx));

  return program;
}

/**
 * Write the default config and an empty templates file on first run.
 */
export function bootstrap(ctx: CommandContext): void {
  ctx.config.createDefaultConfig();

  const templatesPath = getTemplatesPath(ctx.config.getGlobalDir());
  if (!existsSync(templatesPath)) {
    new TemplateRegistry(templatesPath).save();
  }
}

export async function main(): Promise<void> {
  const ctx = createDefaultContext();

  try {
    bootstrap(ctx);
    await createCLI(ctx).parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      getLogger().debug({ err: error }, 'command failed');
      console.error(`\n❌ ${error.message}\n`);
      if (process.env.DEBUG) {
        console.error(error.stack);
      }
    }
    process.exit(1);
  }
}
