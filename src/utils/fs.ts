import { readFileSync, writeFileSync, existsSync, mkdirSync, readdirSync } from 'fs';
import { dirname } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export function ensureDirSync(dirPath: string): void {
  if (!existsSync(dirPath)) {
    mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read file content, returns null if the file doesn't exist
 */
export function readFileIfExists(filePath: string): string | null {
  if (!existsSync(filePath)) return null;
  return readFileSync(filePath, 'utf-8');
}

/**
 * Write file with automatic directory creation
 */
export function writeFileSafe(filePath: string, content: string): void {
  ensureDirSync(dirname(filePath));
  writeFileSync(filePath, content, 'utf-8');
}

/**
 * True when the directory currently has no entries at all
 */
export function isDirectoryEmpty(dirPath: string): boolean {
  return readdirSync(dirPath).length === 0;
}

/**
 * Split text into trimmed lines, skipping blanks and `#` comments
 */
export function readListLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line.length > 0 && !line.startsWith('#'));
}
