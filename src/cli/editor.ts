/**
 * Open files in the current profile's editor and wait for it to exit.
 */

import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError } from '../core/errors.js';
import type { CommandContext } from './context.js';

export async function editFile(ctx: CommandContext, filePath: string): Promise<void> {
  const { editor, editorArgs } = ctx.config.getCurrentProfile();
  if (!editor) {
    throw new ConfigError('No editor is set in the current profile');
  }

  // `.` opens the project directory; here the file is the target.
  const args = [...editorArgs.filter(arg => arg !== '.'), filePath];
  await ctx.launcher({ program: editor, args, quiet: false, forkMode: false });
}

/**
 * Seed a scratch file with `initial`, let the user edit it, and return
 * what was saved. The scratch directory is removed afterwards.
 */
export async function editScratch(ctx: CommandContext, initial: string, fileName = 'buffer.txt'): Promise<string> {
  const dir = mkdtempSync(join(tmpdir(), 'shelf-'));
  const filePath = join(dir, fileName);

  try {
    writeFileSync(filePath, initial, 'utf-8');
    await editFile(ctx, filePath);
    return readFileSync(filePath, 'utf-8');
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
}
