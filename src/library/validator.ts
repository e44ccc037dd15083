import { LibraryError, type InvalidNameReason, type LibraryOperation } from '../core/errors.js';
import { isWindows } from '../utils/platform.js';

const INVALID_CHARACTERS = /[/\\:*?"<>|]/;

/**
 * Directory names that belong to the OS (trash, volume metadata) plus the
 * `-` recent-project sentinel. Never listed, never accepted as a new name.
 */
export const SYSTEM_EXCLUDED_NAMES: readonly string[] = [
  '$RECYCLE.BIN',
  'System Volume Information',
  'msdownld.tmp',
  '.Trash-1000',
  '-',
];

export const WINDOWS_RESERVED_NAMES: readonly string[] = [
  'CON', 'PRN', 'AUX', 'NUL',
  'COM1', 'COM2', 'COM3', 'COM4', 'COM5', 'COM6', 'COM7', 'COM8', 'COM9',
  'LPT1', 'LPT2', 'LPT3', 'LPT4', 'LPT5', 'LPT6', 'LPT7', 'LPT8', 'LPT9',
];

export interface ValidateOptions {
  /** Also reject Windows device names. Defaults to running on Windows. */
  windowsCompat?: boolean;
}

function matchesIgnoringCase(name: string, list: readonly string[]): boolean {
  const lower = name.toLowerCase();
  return list.some(entry => entry.toLowerCase() === lower);
}

export function isSystemExcluded(name: string): boolean {
  return matchesIgnoringCase(name, SYSTEM_EXCLUDED_NAMES);
}

/**
 * Check that `name` can become a project directory.
 * Returns the first rule it breaks, or null when it is acceptable.
 */
export function validateProjectName(name: string, options: ValidateOptions = {}): InvalidNameReason | null {
  if (name.length === 0) return 'empty';
  if (INVALID_CHARACTERS.test(name)) return 'invalid-characters';
  if (name === '.' || name === '..') return 'relative-path';
  if (isSystemExcluded(name)) return 'system-reserved';

  const windowsCompat = options.windowsCompat ?? isWindows();
  if (windowsCompat && matchesIgnoringCase(name, WINDOWS_RESERVED_NAMES)) {
    return 'windows-reserved';
  }

  return null;
}

export function assertValidProjectName(
  name: string,
  operation: LibraryOperation,
  options?: ValidateOptions,
): void {
  const reason = validateProjectName(name, options);
  if (reason) {
    throw LibraryError.invalidName(operation, name, reason);
  }
}
