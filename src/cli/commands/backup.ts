/**
 * `shelf backup` / `shelf import` — Snapshot and restore configuration
 * and templates as a single JSON file.
 */

import { Command } from 'commander';
import { DEFAULT_BACKUP_FILE, loadBackup, saveBackup } from '../../backup/backup.js';
import { loadTemplates, type CommandContext } from '../context.js';

export function createBackupCommand(ctx: CommandContext): Command {
  return new Command('backup')
    .description('Save the configuration and templates to a file')
    .argument('[file]', 'Output file', DEFAULT_BACKUP_FILE)
    .action((file: string) => {
      handleBackup(ctx, file);
    });
}

export function createImportCommand(ctx: CommandContext): Command {
  return new Command('import')
    .description('Restore the configuration and templates from a backup file')
    .argument('<file>', 'Backup file')
    .action((file: string) => {
      handleImport(ctx, file);
    });
}

export function handleBackup(ctx: CommandContext, file: string = DEFAULT_BACKUP_FILE): void {
  saveBackup(file, {
    config: ctx.config.getPersisted(),
    templates: loadTemplates(ctx).toFile(),
  });
  ctx.print(`Backup saved to '${file}'.`);
}

export function handleImport(ctx: CommandContext, file: string): void {
  const backup = loadBackup(file);

  ctx.config.save(backup.config);
  const registry = loadTemplates(ctx);
  registry.replaceAll(backup.templates);
  registry.save();

  ctx.print('Backup has been imported.');
}
