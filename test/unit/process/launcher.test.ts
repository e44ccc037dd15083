import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { launchProgram } from '../../../src/process/launcher.js';
import { ProgramError } from '../../../src/core/errors.js';

const node = process.execPath;
const MISSING_PROGRAM = 'shelf-test-no-such-program';

describe('launchProgram', () => {
  describe('blocking mode', () => {
    it('resolves when the program exits cleanly', async () => {
      await expect(launchProgram({ program: node, args: ['-e', 'process.exit(0)'], quiet: true })).resolves.toBeUndefined();
    });

    it('reports the exit status of a failing program', async () => {
      await expect(launchProgram({ program: node, args: ['-e', 'process.exit(3)'], quiet: true })).rejects.toMatchObject({
        code: 'NON_ZERO_EXIT_CODE',
        exitCode: 3,
      });
    });

    it('reports a program that cannot be found', async () => {
      const err = await launchProgram({ program: MISSING_PROGRAM, quiet: true }).catch((e: unknown) => e);
      expect(err).toBeInstanceOf(ProgramError);
      expect((err as ProgramError).code).toBe('PROGRAM_NOT_FOUND');
      expect((err as ProgramError).message).toBe(`Failed to launch program '${MISSING_PROGRAM}': not found`);
    });

    it('reports a program killed by a signal as interrupted', async () => {
      await expect(
        launchProgram({ program: node, args: ['-e', "process.kill(process.pid, 'SIGTERM')"], quiet: true }),
      ).rejects.toMatchObject({ code: 'PROCESS_INTERRUPTED' });
    });

    it('adds environment pairs on top of the inherited environment', async () => {
      const script = "process.exit(process.env.SHELF_TEST_VAR === 'hello' && process.env.PATH !== undefined ? 0 : 5)";
      await expect(
        launchProgram({ program: node, args: ['-e', script], env: [['SHELF_TEST_VAR', 'hello']], quiet: true }),
      ).resolves.toBeUndefined();
    });

    it('lets later environment pairs win', async () => {
      const script = "process.exit(process.env.SHELF_TEST_VAR === 'second' ? 0 : 5)";
      await expect(
        launchProgram({
          program: node,
          args: ['-e', script],
          env: [['SHELF_TEST_VAR', 'first'], ['SHELF_TEST_VAR', 'second']],
          quiet: true,
        }),
      ).resolves.toBeUndefined();
    });

    describe('working directory', () => {
      let dir: string;

      beforeEach(() => {
        dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'shelf-launch-')));
      });

      afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
      });

      it('runs the program inside cwd', async () => {
        await expect(
          launchProgram({
            program: node,
            args: ['-e', 'process.exit(process.cwd() === process.argv[1] ? 0 : 7)', dir],
            cwd: dir,
            quiet: true,
          }),
        ).resolves.toBeUndefined();
      });
    });
  });

  describe('fork mode', () => {
    it('resolves once the child has spawned', async () => {
      await expect(
        launchProgram({ program: node, args: ['-e', 'process.exit(9)'], quiet: true, forkMode: true }),
      ).resolves.toBeUndefined();
    });

    it('still reports a program that cannot be spawned', async () => {
      await expect(
        launchProgram({ program: MISSING_PROGRAM, quiet: true, forkMode: true }),
      ).rejects.toMatchObject({ code: 'PROGRAM_NOT_FOUND', program: MISSING_PROGRAM });
    });
  });
});
