/**
 * External Process Runner — Types
 */

export interface LaunchOptions {
  program: string;
  args?: string[];
  /** Working directory; the caller's cwd when unset */
  cwd?: string;
  /** Variables set on top of the inherited environment; later pairs win */
  env?: ReadonlyArray<readonly [string, string]>;
  /** Discard stdin, stdout and stderr instead of inheriting them */
  quiet?: boolean;
  /** Spawn detached and return without waiting for the child */
  forkMode?: boolean;
}

export type ProgramLauncher = (options: LaunchOptions) => Promise<void>;
