import { existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { ShelfConfigSchema, type Profile, type ShelfConfig, type ShelfConfigOverrides } from './types.js';
import { ConfigError, ProfileNotFoundError } from './errors.js';
import { ensureDirSync, readFileIfExists, writeFileSafe } from '../utils/fs.js';
import { getConfigPath, getGlobalDir } from '../utils/platform.js';

export class ConfigManager {
  private config: ShelfConfig | null = null;
  /** What config.yaml holds, without env vars or overrides */
  private fileConfig: ShelfConfig | null = null;
  /** Env vars and overrides laid over the file on the last load */
  private layered: Record<string, unknown> = {};
  private overrides?: ShelfConfigOverrides;
  private globalDir: string;

  constructor(globalDir?: string) {
    this.globalDir = globalDir || getGlobalDir();
  }

  /**
   * Load configuration from all sources, merged in order:
   * defaults <- config file <- env vars <- overrides
   */
  load(overrides?: ShelfConfigOverrides): ShelfConfig {
    let raw: Record<string, unknown> = {};

    const configPath = this.getConfigPath();
    let content: string | null;
    try {
      content = readFileIfExists(configPath);
    } catch (err) {
      throw new ConfigError(`Failed to read config at ${configPath}`, asError(err));
    }

    if (content !== null) {
      try {
        const parsed: unknown = parseYaml(content);
        if (isRecord(parsed)) {
          raw = parsed;
        }
      } catch (err) {
        throw new ConfigError(`Failed to parse config at ${configPath}`, asError(err));
      }
    }

    const layered = overrides ? deepMerge(envLayer(), { ...overrides }) : envLayer();

    const result = ShelfConfigSchema.safeParse(deepMerge(raw, layered));
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }
    const fileResult = ShelfConfigSchema.safeParse(raw);
    if (!fileResult.success) {
      throw new ConfigError(`Invalid configuration: ${fileResult.error.message}`, fileResult.error);
    }

    this.overrides = overrides;
    this.layered = layered;
    this.fileConfig = fileResult.data;
    this.config = result.data;
    return this.config;
  }

  /**
   * Get the loaded configuration
   */
  get(): ShelfConfig {
    if (!this.config) {
      return this.load();
    }
    return this.config;
  }

  /**
   * Persist the given (or currently loaded) configuration as YAML.
   * Values that still equal what an env var or override supplied are
   * written back as the file had them.
   */
  save(config: ShelfConfig = this.get()): void {
    const persisted = this.toPersisted(config);
    const configPath = this.getConfigPath();
    try {
      writeFileSafe(configPath, stringifyYaml(persisted));
    } catch (err) {
      throw new ConfigError(`Failed to write config at ${configPath}`, asError(err));
    }
    this.fileConfig = persisted;
    this.config = config;
  }

  /**
   * The configuration as it is stored on disk, without env vars or overrides
   */
  getPersisted(): ShelfConfig {
    return this.toPersisted(this.get());
  }

  /**
   * Replace the stored configuration with defaults, then reload
   */
  reset(): ShelfConfig {
    this.save(ShelfConfigSchema.parse({}));
    return this.load(this.overrides);
  }

  getProfile(name: string): Profile {
    const profile = this.get().profiles[name];
    if (!profile) {
      throw new ProfileNotFoundError(name);
    }
    return profile;
  }

  getCurrentProfile(): Profile {
    return this.getProfile(this.get().options.currentProfile);
  }

  /**
   * Remember the last opened project. No-op when recent tracking is off
   * or the name did not change.
   */
  setRecent(name: string): boolean {
    const config = this.get();
    if (!config.recent.enabled || config.recent.recentProject === name) {
      return false;
    }
    this.save({ ...config, recent: { ...config.recent, recentProject: name } });
    return true;
  }

  getGlobalDir(): string {
    return this.globalDir;
  }

  getConfigPath(): string {
    return getConfigPath(this.globalDir);
  }

  /**
   * Ensure all required directories exist
   */
  ensureDirectories(): void {
    for (const dir of [this.globalDir, join(this.globalDir, 'logs')]) {
      ensureDirSync(dir);
    }
  }

  /**
   * Create default config if it doesn't exist
   */
  createDefaultConfig(): void {
    this.ensureDirectories();
    if (!existsSync(this.getConfigPath())) {
      this.save(ShelfConfigSchema.parse({}));
    }
  }

  private toPersisted(config: ShelfConfig): ShelfConfig {
    if (!this.fileConfig) {
      return config;
    }

    const result = ShelfConfigSchema.safeParse(restoreFileValues(config, this.fileConfig, this.layered));
    if (!result.success) {
      throw new ConfigError(`Invalid configuration: ${result.error.message}`, result.error);
    }
    return result.data;
  }
}

function envLayer(): Record<string, unknown> {
  const options: Record<string, unknown> = {};

  if (process.env.SHELF_PROJECTS_DIR) {
    options.projectsDirectory = process.env.SHELF_PROJECTS_DIR;
  }
  if (process.env.SHELF_PROFILE) {
    options.currentProfile = process.env.SHELF_PROFILE;
  }

  return Object.keys(options).length > 0 ? { options } : {};
}

/**
 * Undo `layered` on `current`: every leaf that still holds the layered
 * value goes back to the file's value. Leaves changed since are kept.
 */
function restoreFileValues(
  current: Record<string, unknown>,
  file: Record<string, unknown>,
  layered: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...current };
  for (const [key, value] of Object.entries(layered)) {
    const now = current[key];
    const before = file[key];
    if (isRecord(value)) {
      if (isRecord(now) && isRecord(before)) {
        result[key] = restoreFileValues(now, before, value);
      } else if (isRecord(now) && before === undefined && matchesLayer(now, value)) {
        delete result[key];
      }
    } else if (sameValue(now, value)) {
      result[key] = before;
    }
  }
  return result;
}

function matchesLayer(current: Record<string, unknown>, layer: Record<string, unknown>): boolean {
  return Object.entries(layer).every(([key, value]) => {
    const now = current[key];
    return isRecord(value) ? isRecord(now) && matchesLayer(now, value) : sameValue(now, value);
  });
}

function sameValue(a: unknown, b: unknown): boolean {
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => sameValue(item, b[i]));
  }
  return a === b;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const next = source[key];
    const prev = target[key];
    if (next === undefined) continue;
    if (isRecord(next) && isRecord(prev)) {
      result[key] = deepMerge(prev, next);
    } else {
      result[key] = next;
    }
  }
  return result;
}
