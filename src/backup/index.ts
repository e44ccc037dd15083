export { saveBackup, loadBackup, DEFAULT_BACKUP_FILE } from './backup.js';
export type { Backup } from '../core/types.js';
