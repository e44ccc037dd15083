import { homedir, platform } from 'os';
import { basename, join } from 'path';

/**
 * Get the shelf data directory (`SHELF_HOME` or `~/.shelf`)
 */
export function getGlobalDir(): string {
  return process.env.SHELF_HOME || join(homedir(), '.shelf');
}

/**
 * Get the global config file path
 */
export function getConfigPath(globalDir: string = getGlobalDir()): string {
  return join(globalDir, 'config.yaml');
}

/**
 * Get the templates file path
 */
export function getTemplatesPath(globalDir: string = getGlobalDir()): string {
  return join(globalDir, 'templates.yaml');
}

/**
 * Directory used for projects when the config does not name one
 */
export function getDefaultProjectsDir(): string {
  return join(homedir(), 'projects');
}

export function isWindows(): boolean {
  return platform() === 'win32';
}

/**
 * Get the user's default shell
 */
export function getDefaultShell(): string {
  if (isWindows()) {
    return process.env.ComSpec ? basename(process.env.ComSpec) : 'powershell.exe';
  }
  return process.env.SHELL ? basename(process.env.SHELL) : 'sh';
}

/**
 * Get the user's default editor
 */
export function getDefaultEditor(): string {
  const fromEnv = process.env.VISUAL || process.env.EDITOR;
  if (fromEnv) return fromEnv;
  return isWindows() ? 'notepad' : 'vi';
}

/**
 * Arguments that make a shell run a single command string
 */
export function getShellCommandArgs(shell: string): string[] {
  switch (shell.toLowerCase()) {
    case 'powershell':
    case 'powershell.exe':
    case 'pwsh':
    case 'pwsh.exe':
      return ['-NoLogo', '-Command'];
    case 'cmd':
    case 'cmd.exe':
      return ['/C'];
    default:
      return ['-c'];
  }
}

const GUI_EDITORS = new Set([
  'code', 'code-insiders', 'codium', 'code-oss', 'cursor', 'windsurf', 'zed',
]);

/**
 * GUI editors are launched detached and opened on the project directory
 */
export function isGuiEditor(editor: string): boolean {
  return GUI_EDITORS.has(editor.replace(/\.cmd$/i, '').toLowerCase());
}
