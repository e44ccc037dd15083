import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TemplateProvisioner, PROJECT_ENV_VAR, type TemplateSource } from '../../../src/templates/provisioner.js';
import { ProjectLibrary } from '../../../src/library/library.js';
import { LibraryError, ProgramError, ProvisionError, TemplateError } from '../../../src/core/errors.js';
import type { Profile } from '../../../src/core/types.js';
import type { ProgramLauncher } from '../../../src/process/types.js';
import type { ProvisionTransition } from '../../../src/templates/types.js';

const shellProfile: Profile = {
  editor: 'vi',
  editorArgs: [],
  editorForkMode: false,
  shell: 'sh',
  shellArgs: ['-c'],
};

function templatesOf(entries: Record<string, string[]>): TemplateSource {
  return {
    get: (name) => {
      const commands = entries[name];
      return commands ? { name, commands } : undefined;
    },
  };
}

describe('TemplateProvisioner', () => {
  let root: string;
  let library: ProjectLibrary;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'shelf-provision-'));
    library = new ProjectLibrary(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  // ─── Success path ────────────────────────────────────────────

  it('runs every command in order inside the new project', async () => {
    const launcher = vi.fn<ProgramLauncher>().mockResolvedValue(undefined);
    const provisioner = new TemplateProvisioner({
      library,
      templates: templatesOf({ node: ['npm init -y', 'git init'] }),
      launcher,
    });

    const result = await provisioner.provision({ projectName: 'api', templateName: 'node', profile: shellProfile, quiet: true });

    const projectPath = path.join(root, 'api');
    expect(result.project).toEqual({ name: 'api', path: projectPath });
    expect(result.commandsRun).toEqual(['npm init -y', 'git init']);
    expect(launcher).toHaveBeenCalledTimes(2);
    expect(launcher).toHaveBeenNthCalledWith(1, {
      program: 'sh',
      args: ['-c', 'npm init -y'],
      cwd: projectPath,
      env: [[PROJECT_ENV_VAR, 'api']],
      quiet: true,
      forkMode: false,
    });
    expect(launcher.mock.calls[1]?.[0].args).toEqual(['-c', 'git init']);
    expect(library.contains('api')).toBe(true);
    expect(fs.existsSync(projectPath)).toBe(true);
  });

  it('moves through created, provisioning and completed', async () => {
    const seen: ProvisionTransition[] = [];
    const provisioner = new TemplateProvisioner({
      library,
      templates: templatesOf({ t: ['true'] }),
      launcher: vi.fn<ProgramLauncher>().mockResolvedValue(undefined),
    });

    const result = await provisioner.provision({
      projectName: 'p',
      templateName: 't',
      profile: shellProfile,
      onTransition: (transition) => seen.push(transition),
    });

    expect(result.history.map(t => [t.from, t.to])).toEqual([
      [null, 'created'],
      ['created', 'provisioning'],
      ['provisioning', 'completed'],
    ]);
    expect(seen).toEqual(result.history);
  });

  it('reports progress before each command', async () => {
    const onCommand = vi.fn();
    const provisioner = new TemplateProvisioner({
      library,
      templates: templatesOf({ t: ['one', 'two'] }),
      launcher: vi.fn<ProgramLauncher>().mockResolvedValue(undefined),
    });

    await provisioner.provision({ projectName: 'p', templateName: 't', profile: shellProfile, onCommand });

    expect(onCommand.mock.calls).toEqual([
      ['one', 1, 2],
      ['two', 2, 2],
    ]);
  });

  // ─── Preconditions ──────────────────────────────────────────

  it('fails on an unknown template without creating anything', async () => {
    const launcher = vi.fn<ProgramLauncher>();
    const provisioner = new TemplateProvisioner({ library, templates: templatesOf({}), launcher });

    await expect(
      provisioner.provision({ projectName: 'p', templateName: 'missing', profile: shellProfile }),
    ).rejects.toMatchObject({ code: 'TEMPLATE_NOT_FOUND', message: "Template 'missing' not found" });
    expect(fs.readdirSync(root)).toEqual([]);
    expect(launcher).not.toHaveBeenCalled();
  });

  it('fails when the profile has no shell without creating anything', async () => {
    const provisioner = new TemplateProvisioner({ library, templates: templatesOf({ t: ['x'] }), launcher: vi.fn<ProgramLauncher>() });

    const err = await provisioner
      .provision({ projectName: 'p', templateName: 't', profile: { ...shellProfile, shell: '  ' } })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TemplateError);
    expect((err as TemplateError).code).toBe('SHELL_NOT_CONFIGURED');
    expect(fs.existsSync(path.join(root, 'p'))).toBe(false);
  });

  it('surfaces the library error when the project already exists', async () => {
    fs.mkdirSync(path.join(root, 'taken'));
    fs.writeFileSync(path.join(root, 'taken', 'keep'), '');
    const launcher = vi.fn<ProgramLauncher>();
    const provisioner = new TemplateProvisioner({ library, templates: templatesOf({ t: ['x'] }), launcher });

    await expect(
      provisioner.provision({ projectName: 'taken', templateName: 't', profile: shellProfile }),
    ).rejects.toBeInstanceOf(LibraryError);
    expect(fs.existsSync(path.join(root, 'taken', 'keep'))).toBe(true);
    expect(launcher).not.toHaveBeenCalled();
  });

  // ─── Rollback ───────────────────────────────────────────────

  it('deletes the project and names the failing command', async () => {
    const launcher = vi.fn<ProgramLauncher>()
      .mockResolvedValueOnce(undefined)
      .mockRejectedValueOnce(new ProgramError('NON_ZERO_EXIT_CODE', 'sh', 1));
    const provisioner = new TemplateProvisioner({ library, templates: templatesOf({ t: ['cmd1', 'cmd2', 'cmd3'] }), launcher });

    const err = await provisioner
      .provision({ projectName: 'broken', templateName: 't', profile: shellProfile })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProvisionError);
    const failure = err as ProvisionError;
    expect(failure.command).toBe('cmd2');
    expect(failure.step).toBe(2);
    expect(failure.cleanupError).toBeUndefined();
    expect(failure.message).toBe("Template command 'cmd2' (step 2) failed: Program 'sh' exited with non-zero status: 1");
    expect(launcher).toHaveBeenCalledTimes(2);
    expect(fs.existsSync(path.join(root, 'broken'))).toBe(false);
    expect(library.contains('broken')).toBe(false);
  });

  it('ends in rolled-back after a failure', async () => {
    const seen: ProvisionTransition[] = [];
    const provisioner = new TemplateProvisioner({
      library,
      templates: templatesOf({ t: ['bad'] }),
      launcher: vi.fn<ProgramLauncher>().mockRejectedValue(new ProgramError('PROGRAM_NOT_FOUND', 'sh')),
    });

    await expect(
      provisioner.provision({ projectName: 'p', templateName: 't', profile: shellProfile, onTransition: (t) => seen.push(t) }),
    ).rejects.toBeInstanceOf(ProvisionError);
    expect(seen.map(t => t.to)).toEqual(['created', 'provisioning', 'rolled-back']);
  });

  it('reports a failed cleanup next to the command failure and keeps the entry', async () => {
    const failingLibrary = {
      create: (name: string) => library.create(name),
      delete: () => {
        throw LibraryError.io('delete', 'p', Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));
      },
    };
    const provisioner = new TemplateProvisioner({
      library: failingLibrary,
      templates: templatesOf({ t: ['bad'] }),
      launcher: vi.fn<ProgramLauncher>().mockRejectedValue(new ProgramError('NON_ZERO_EXIT_CODE', 'sh', 2)),
    });

    const err = await provisioner
      .provision({ projectName: 'p', templateName: 't', profile: shellProfile })
      .catch((e: unknown) => e);

    const failure = err as ProvisionError;
    expect(failure.cause).toBeInstanceOf(ProgramError);
    expect(failure.cleanupError).toBeInstanceOf(LibraryError);
    expect(failure.message).toBe(
      "Template command 'bad' (step 1) failed: Program 'sh' exited with non-zero status: 2; "
        + "additionally, cleanup of 'p' failed: Failed to delete 'p': permission denied (EACCES: permission denied)",
    );
    expect(library.contains('p')).toBe(true);
  });

  it('wraps a non-program launcher failure', async () => {
    const provisioner = new TemplateProvisioner({
      library,
      templates: templatesOf({ t: ['x'] }),
      launcher: vi.fn<ProgramLauncher>().mockRejectedValue(new Error('boom')),
    });

    await expect(
      provisioner.provision({ projectName: 'p', templateName: 't', profile: shellProfile }),
    ).rejects.toMatchObject({ message: "Template command 'x' (step 1) failed: Unexpected error running 'sh': boom" });
  });

  // ─── Real processes ─────────────────────────────────────────

  it('rolls back when a real command exits non-zero', async () => {
    const nodeProfile: Profile = { ...shellProfile, shell: process.execPath, shellArgs: ['-e'] };
    const provisioner = new TemplateProvisioner({
      library,
      templates: templatesOf({
        t: ["require('fs').writeFileSync('marker', process.env.SHELF_PROJECT)", 'process.exit(1)'],
      }),
    });

    const err = await provisioner
      .provision({ projectName: 'real', templateName: 't', profile: nodeProfile, quiet: true })
      .catch((e: unknown) => e);

    expect((err as ProvisionError).command).toBe('process.exit(1)');
    expect(fs.existsSync(path.join(root, 'real'))).toBe(false);
  });

  it('passes the project name to real commands', async () => {
    const nodeProfile: Profile = { ...shellProfile, shell: process.execPath, shellArgs: ['-e'] };
    const provisioner = new TemplateProvisioner({
      library,
      templates: templatesOf({ t: ["require('fs').writeFileSync('marker', process.env.SHELF_PROJECT)"] }),
    });

    await provisioner.provision({ projectName: 'real', templateName: 't', profile: nodeProfile, quiet: true });

    expect(fs.readFileSync(path.join(root, 'real', 'marker'), 'utf-8')).toBe('real');
  });
});
