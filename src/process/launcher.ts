import { spawn, spawnSync, type StdioOptions } from 'child_process';
import { ProgramError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { LaunchOptions } from './types.js';

/**
 * Run an external program.
 *
 * Blocking mode waits for the child to exit and rejects with a classified
 * ProgramError on a spawn failure, a signal, or a non-zero exit code.
 * Fork mode resolves as soon as the child has spawned; its exit status is
 * never observed.
 */
export async function launchProgram(options: LaunchOptions): Promise<void> {
  const args = options.args ?? [];
  const stdio: StdioOptions = options.quiet ? 'ignore' : 'inherit';
  const env = buildEnv(options.env);

  getLogger().debug(
    { program: options.program, args, cwd: options.cwd, forkMode: options.forkMode ?? false },
    'launching program',
  );

  if (options.forkMode) {
    await spawnDetached(options.program, args, { cwd: options.cwd, env, stdio });
    return;
  }

  const result = spawnSync(options.program, args, { cwd: options.cwd, env, stdio });

  if (result.error) {
    throw ProgramError.fromSpawnError(options.program, result.error);
  }
  if (result.status === null) {
    getLogger().debug({ program: options.program, signal: result.signal }, 'program terminated by signal');
    throw new ProgramError('PROCESS_INTERRUPTED', options.program);
  }
  if (result.status !== 0) {
    throw new ProgramError('NON_ZERO_EXIT_CODE', options.program, result.status);
  }
}

function buildEnv(overrides: LaunchOptions['env']): NodeJS.ProcessEnv {
  if (!overrides || overrides.length === 0) {
    return process.env;
  }
  return { ...process.env, ...Object.fromEntries(overrides) };
}

function spawnDetached(
  program: string,
  args: string[],
  spawnOptions: { cwd?: string; env: NodeJS.ProcessEnv; stdio: StdioOptions },
): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(program, args, { ...spawnOptions, detached: true });
    child.once('error', (err) => {
      reject(ProgramError.fromSpawnError(program, err));
    });
    child.once('spawn', () => {
      child.unref();
      resolve();
    });
  });
}
