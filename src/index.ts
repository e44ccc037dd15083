/**
 * shelf — local project directory manager
 * Public SDK exports for programmatic usage
 *
 * @example
 * ```typescript
 * import { ProjectLibrary, TemplateRegistry, TemplateProvisioner, ConfigManager } from 'shelf';
 *
 * const config = new ConfigManager().load();
 * const library = new ProjectLibrary(config.options.projectsDirectory);
 * const provisioner = new TemplateProvisioner({ library, templates: TemplateRegistry.load() });
 * await provisioner.provision({
 *   projectName: 'api',
 *   templateName: 'node',
 *   profile: config.profiles[config.options.currentProfile],
 * });
 * ```
 */

// Core
export { ConfigManager } from './core/config.js';
export { createLogger, getLogger, setLogger } from './core/logger.js';
export {
  ShelfError,
  ConfigError,
  ProfileNotFoundError,
  LibraryError,
  ProgramError,
  TemplateError,
  ProvisionError,
  BackupError,
  classifyIoError,
  type LibraryErrorCode,
  type LibraryOperation,
  type IoErrorKind,
  type InvalidNameReason,
  type ProgramErrorCode,
  type TemplateErrorCode,
  type BackupErrorCode,
} from './core/errors.js';
export {
  ShelfConfigSchema,
  ProfileSchema,
  defaultProfile,
  type ShelfConfig,
  type ShelfConfigOverrides,
  type Profile,
} from './core/types.js';

// Library
export * from './library/index.js';

// Process
export * from './process/index.js';

// Resolver
export * from './resolver/index.js';

// Templates
export * from './templates/index.js';

// Backup
export * from './backup/index.js';

// CLI
export { createCLI, main } from './cli/index.js';

// Version
export { VERSION, NAME } from './version.js';
