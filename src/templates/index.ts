/**
 * Project Templates
 *
 * Barrel exports for the template registry and the provisioning pipeline.
 */

export { TemplateRegistry, parseTemplateCommands } from './registry.js';
export {
  TemplateProvisioner,
  PROJECT_ENV_VAR,
  type ProvisionerDeps,
  type TemplateSource,
} from './provisioner.js';
export type {
  Template,
  ProvisionState,
  ProvisionTransition,
  ProvisionRequest,
  ProvisionResult,
} from './types.js';
