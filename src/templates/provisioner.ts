/**
 * TemplateProvisioner — create a project and run a template inside it.
 *
 *   created ──► provisioning ──► completed
 *                     │
 *                     └────────► rolled-back
 *
 * Commands run strictly one after another. The first failing command stops
 * the run and the new directory is deleted again. A failed delete is
 * reported alongside the command failure, never instead of it.
 */

import { ProgramError, ProvisionError, ShelfError, TemplateError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import type { ProjectLibrary } from '../library/library.js';
import { launchProgram } from '../process/launcher.js';
import type { ProgramLauncher } from '../process/types.js';
import type {
  ProvisionRequest,
  ProvisionResult,
  ProvisionState,
  ProvisionTransition,
  Template,
} from './types.js';

/** Environment variable carrying the new project's name into each command */
export const PROJECT_ENV_VAR = 'SHELF_PROJECT';

const TRANSITIONS: Record<ProvisionState, readonly ProvisionState[]> = {
  'created': ['provisioning'],
  'provisioning': ['completed', 'rolled-back'],
  'completed': [],
  'rolled-back': [],
};

export interface TemplateSource {
  get(name: string): Template | undefined;
}

export interface ProvisionerDeps {
  library: Pick<ProjectLibrary, 'create' | 'delete'>;
  templates: TemplateSource;
  launcher?: ProgramLauncher;
}

class ProvisionRun {
  private state: ProvisionState | null = null;
  readonly history: ProvisionTransition[] = [];

  constructor(
    private readonly project: string,
    private readonly onTransition?: (transition: ProvisionTransition) => void,
  ) {}

  transition(to: ProvisionState): void {
    const allowed = this.state === null ? to === 'created' : TRANSITIONS[this.state].includes(to);
    if (!allowed) {
      throw new ShelfError(`Invalid provisioning transition ${this.state ?? 'start'} -> ${to}`, 'INVALID_TRANSITION');
    }

    const transition: ProvisionTransition = { from: this.state, to, timestamp: Date.now() };
    this.state = to;
    this.history.push(transition);
    getLogger().debug({ project: this.project, from: transition.from, to }, 'provisioning state');
    this.onTransition?.(transition);
  }
}

export class TemplateProvisioner {
  private readonly library: ProvisionerDeps['library'];
  private readonly templates: TemplateSource;
  private readonly launcher: ProgramLauncher;

  constructor(deps: ProvisionerDeps) {
    this.library = deps.library;
    this.templates = deps.templates;
    this.launcher = deps.launcher ?? launchProgram;
  }

  async provision(request: ProvisionRequest): Promise<ProvisionResult> {
    const { projectName, templateName, profile } = request;

    const template = this.templates.get(templateName);
    if (!template) {
      throw new TemplateError('TEMPLATE_NOT_FOUND', templateName);
    }
    if (profile.shell.trim().length === 0) {
      throw new TemplateError('SHELL_NOT_CONFIGURED', templateName);
    }

    const startedAt = Date.now();
    const project = this.library.create(projectName);
    const run = new ProvisionRun(projectName, request.onTransition);
    run.transition('created');
    run.transition('provisioning');

    const commandsRun: string[] = [];
    const total = template.commands.length;

    for (const [index, command] of template.commands.entries()) {
      const step = index + 1;
      request.onCommand?.(command, step, total);

      try {
        await this.launcher({
          program: profile.shell,
          args: [...profile.shellArgs, command],
          cwd: project.path,
          env: [[PROJECT_ENV_VAR, projectName]],
          quiet: request.quiet ?? false,
          forkMode: false,
        });
      } catch (err) {
        const cause = err instanceof ProgramError
          ? err
          : new ProgramError('UNEXPECTED_ERROR', profile.shell, undefined, err instanceof Error ? err : undefined);
        throw this.rollback(run, projectName, command, step, cause);
      }

      commandsRun.push(command);
    }

    run.transition('completed');
    return { project, commandsRun, history: run.history, elapsedMs: Date.now() - startedAt };
  }

  private rollback(
    run: ProvisionRun,
    projectName: string,
    command: string,
    step: number,
    cause: ProgramError,
  ): ProvisionError {
    getLogger().warn({ project: projectName, command, step, err: cause.message }, 'template command failed, rolling back');

    let cleanupError: ShelfError | undefined;
    try {
      this.library.delete(projectName);
    } catch (err) {
      cleanupError = err instanceof ShelfError
        ? err
        : new ShelfError(String(err), 'CLEANUP_FAILED', err instanceof Error ? err : undefined);
      getLogger().warn({ project: projectName, err: cleanupError.message }, 'rollback delete failed');
    }

    run.transition('rolled-back');
    return new ProvisionError(projectName, command, step, cause, cleanupError);
  }
}
