/**
 * Project Library
 *
 * Barrel exports for the project collection and name validation.
 */

export { ProjectLibrary, collectProjects, IGNORE_FILE } from './library.js';
export {
  validateProjectName,
  assertValidProjectName,
  isSystemExcluded,
  SYSTEM_EXCLUDED_NAMES,
  WINDOWS_RESERVED_NAMES,
  type ValidateOptions,
} from './validator.js';
export type { Project, LibraryOptions, CloneOptions } from './types.js';
