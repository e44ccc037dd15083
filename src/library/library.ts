/**
 * ProjectLibrary — directory-backed project collection.
 *
 * The index is a snapshot of one scan of `basePath` taken at construction.
 * Mutations through the library keep it in step; anything changed on disk
 * by someone else is only seen by a new ProjectLibrary.
 */

import { existsSync, mkdirSync, readdirSync, readFileSync, renameSync, rmSync, statSync, type Dirent } from 'fs';
import { join, resolve } from 'path';
import { LibraryError, ProgramError, errnoCode, type LibraryOperation } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { isDirectoryEmpty, readListLines } from '../utils/fs.js';
import { launchProgram } from '../process/launcher.js';
import type { ProgramLauncher } from '../process/types.js';
import { assertValidProjectName, SYSTEM_EXCLUDED_NAMES, validateProjectName } from './validator.js';
import type { CloneOptions, LibraryOptions, Project } from './types.js';

export const IGNORE_FILE = '.ignore';

export class ProjectLibrary {
  readonly basePath: string;
  private readonly windowsCompat?: boolean;
  private projects: Map<string, Project>;

  constructor(basePath: string, options: LibraryOptions = {}) {
    this.basePath = resolve(basePath);
    this.windowsCompat = options.windowsCompat;

    if (!isDirectory(this.basePath)) {
      throw LibraryError.invalidPath(this.basePath);
    }

    this.projects = collectProjects(this.basePath, options.displayHidden ?? false);
    getLogger().debug({ basePath: this.basePath, count: this.projects.size }, 'library scanned');
  }

  // ─────────────────────────────────────────────────────────────
  // LOOKUPS
  // ─────────────────────────────────────────────────────────────

  get(name: string): Project | undefined {
    return this.projects.get(name);
  }

  contains(name: string): boolean {
    return this.projects.has(name);
  }

  /** Project names in scan/insertion order */
  getNames(): string[] {
    return Array.from(this.projects.keys());
  }

  getAll(): Project[] {
    return Array.from(this.projects.values());
  }

  isEmpty(): boolean {
    return this.projects.size === 0;
  }

  get size(): number {
    return this.projects.size;
  }

  /**
   * Live check of the project directory, not of the index.
   */
  isProjectEmpty(name: string): boolean {
    const project = this.projects.get(name);
    if (!project) {
      throw LibraryError.notFound('inspect', name);
    }
    try {
      return isDirectoryEmpty(project.path);
    } catch (err) {
      throw LibraryError.io('inspect', name, err);
    }
  }

  // ─────────────────────────────────────────────────────────────
  // MUTATIONS
  // ─────────────────────────────────────────────────────────────

  create(name: string): Project {
    const path = join(this.basePath, name);
    if (existsSync(path)) {
      throw LibraryError.alreadyExists('create', name);
    }

    assertValidProjectName(name, 'create', { windowsCompat: this.windowsCompat });

    try {
      mkdirSync(path);
    } catch (err) {
      if (errnoCode(err) === 'EEXIST') {
        throw LibraryError.alreadyExists('create', name);
      }
      throw LibraryError.io('create', name, err);
    }

    const project: Project = { name, path };
    this.projects.set(name, project);
    getLogger().debug({ project: name }, 'project created');
    return project;
  }

  /**
   * Recursively remove the project directory. The index entry goes only
   * once the removal reported success.
   */
  delete(name: string): void {
    this.assertDirectChild(name, 'delete');

    try {
      rmSync(join(this.basePath, name), { recursive: true });
    } catch (err) {
      throw LibraryError.io('delete', name, err);
    }

    this.projects.delete(name);
    getLogger().debug({ project: name }, 'project deleted');
  }

  rename(oldName: string, newName: string): Project {
    const existing = this.projects.get(oldName);
    if (!existing) {
      throw LibraryError.notFound('rename', oldName);
    }

    if (this.projects.has(newName)) {
      throw LibraryError.alreadyExists('rename', newName);
    }

    assertValidProjectName(newName, 'rename', { windowsCompat: this.windowsCompat });

    // Unlisted entries still block the move.
    const newPath = join(this.basePath, newName);
    if (existsSync(newPath)) {
      throw LibraryError.alreadyExists('rename', newName);
    }

    try {
      renameSync(existing.path, newPath);
    } catch (err) {
      throw LibraryError.io('rename', oldName, err);
    }

    // Swap in one assignment, keeping the entry's position.
    const renamed: Project = { name: newName, path: newPath };
    this.projects = new Map(
      Array.from(this.projects, ([key, project]): [string, Project] =>
        key === oldName ? [newName, renamed] : [key, project]),
    );

    getLogger().debug({ from: oldName, to: newName }, 'project renamed');
    return renamed;
  }

  /**
   * `git clone` a repository into the library root.
   */
  async clone(options: CloneOptions, launcher: ProgramLauncher = launchProgram): Promise<void> {
    const args = ['clone', options.remote];
    if (options.name) {
      assertValidProjectName(options.name, 'clone', { windowsCompat: this.windowsCompat });
      args.push(options.name);
    }
    if (options.branch) {
      args.push('-b', options.branch);
    }

    try {
      await launcher({
        program: 'git',
        args,
        cwd: this.basePath,
        quiet: options.quiet ?? false,
        forkMode: false,
      });
    } catch (err) {
      if (err instanceof ProgramError) {
        throw new LibraryError('CLONE_FAILED', { operation: 'clone', target: options.remote }, err);
      }
      throw err;
    }
  }

  private assertDirectChild(name: string, operation: LibraryOperation): void {
    const reason = validateProjectName(name, { windowsCompat: false });
    if (reason === 'empty' || reason === 'invalid-characters' || reason === 'relative-path') {
      throw LibraryError.invalidName(operation, name, reason);
    }
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function isListedEntry(entry: Dirent, displayHidden: boolean): boolean {
  if (!displayHidden && entry.name.startsWith('.')) return false;
  // Exact-case match; the validator is the case-insensitive gate for new names.
  return entry.isDirectory() && !SYSTEM_EXCLUDED_NAMES.includes(entry.name);
}

/**
 * Scan `basePath` once. Any I/O failure aborts the whole scan.
 */
export function collectProjects(basePath: string, displayHidden: boolean): Map<string, Project> {
  let entries: Dirent[];
  try {
    entries = readdirSync(basePath, { withFileTypes: true });
  } catch (err) {
    throw LibraryError.io('scan', basePath, err);
  }

  const projects = new Map<string, Project>();
  for (const entry of entries) {
    if (isListedEntry(entry, displayHidden)) {
      projects.set(entry.name, { name: entry.name, path: join(basePath, entry.name) });
    }
  }

  const ignorePath = join(basePath, IGNORE_FILE);
  if (existsSync(ignorePath)) {
    let content: string;
    try {
      content = readFileSync(ignorePath, 'utf-8');
    } catch (err) {
      throw LibraryError.io('scan', ignorePath, err);
    }
    for (const ignored of readListLines(content)) {
      projects.delete(ignored);
    }
  }

  return projects;
}
