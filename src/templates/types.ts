/**
 * Project Template System — Types
 *
 * A template is a named, ordered list of shell commands run inside a
 * freshly created project directory.
 */

import type { Profile } from '../core/types.js';
import type { Project } from '../library/types.js';

export interface Template {
  name: string;
  commands: string[];
}

export type ProvisionState = 'created' | 'provisioning' | 'completed' | 'rolled-back';

export interface ProvisionTransition {
  from: ProvisionState | null;
  to: ProvisionState;
  timestamp: number;
}

export interface ProvisionRequest {
  projectName: string;
  templateName: string;
  profile: Profile;
  /** Hide the commands' output */
  quiet?: boolean;
  /** Called before each command runs; `step` is 1-based */
  onCommand?: (command: string, step: number, total: number) => void;
  onTransition?: (transition: ProvisionTransition) => void;
}

export interface ProvisionResult {
  project: Project;
  commandsRun: string[];
  history: ProvisionTransition[];
  elapsedMs: number;
}
