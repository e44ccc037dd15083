/**
 * Backup — JSON snapshot of the configuration and the templates.
 */

import { readFileSync } from 'fs';
import { BackupError } from '../core/errors.js';
import { BackupSchema, type Backup } from '../core/types.js';
import { writeFileSafe } from '../utils/fs.js';

export const DEFAULT_BACKUP_FILE = 'shelf_backup.json';

export function saveBackup(path: string, backup: Backup): void {
  try {
    writeFileSafe(path, JSON.stringify(backup, null, 2));
  } catch (err) {
    throw new BackupError('WRITE_FAILED', path, err instanceof Error ? err : undefined);
  }
}

export function loadBackup(path: string): Backup {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new BackupError('READ_FAILED', path, err instanceof Error ? err : undefined);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new BackupError('BAD_BACKUP', path, err instanceof Error ? err : undefined);
  }

  const result = BackupSchema.safeParse(parsed);
  if (!result.success) {
    throw new BackupError('BAD_BACKUP', path, result.error);
  }
  return result.data;
}
