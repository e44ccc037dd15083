/**
 * Template Registry — named command lists persisted as YAML.
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { TemplateError } from '../core/errors.js';
import { TemplatesFileSchema, type TemplatesFile } from '../core/types.js';
import { readFileIfExists, readListLines, writeFileSafe } from '../utils/fs.js';
import { getTemplatesPath } from '../utils/platform.js';
import type { Template } from './types.js';

export class TemplateRegistry {
  private templates: Map<string, string[]> = new Map();

  constructor(private readonly filePath: string = getTemplatesPath()) {}

  /** Create a registry and read its file; a missing file means no templates */
  static load(filePath?: string): TemplateRegistry {
    const registry = new TemplateRegistry(filePath);
    registry.load();
    return registry;
  }

  load(): void {
    let content: string | null;
    try {
      content = readFileIfExists(this.filePath);
    } catch (err) {
      throw new TemplateError('STORE_ERROR', this.filePath, err instanceof Error ? err : undefined);
    }

    if (content === null) {
      this.templates = new Map();
      return;
    }

    let parsed: unknown;
    try {
      parsed = parseYaml(content) ?? {};
    } catch (err) {
      throw new TemplateError('STORE_ERROR', this.filePath, err instanceof Error ? err : undefined);
    }

    const result = TemplatesFileSchema.safeParse(parsed);
    if (!result.success) {
      throw new TemplateError('STORE_ERROR', this.filePath, result.error);
    }
    this.replaceAll(result.data);
  }

  save(): void {
    try {
      writeFileSafe(this.filePath, stringifyYaml(this.toFile()));
    } catch (err) {
      throw new TemplateError('STORE_ERROR', this.filePath, err instanceof Error ? err : undefined);
    }
  }

  getPath(): string {
    return this.filePath;
  }

  get(name: string): Template | undefined {
    const commands = this.templates.get(name);
    return commands ? { name, commands: [...commands] } : undefined;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /** Template names in the order they were added */
  list(): string[] {
    return Array.from(this.templates.keys());
  }

  add(name: string, commands: string[]): Template {
    if (this.templates.has(name)) {
      throw new TemplateError('TEMPLATE_EXISTS', name);
    }
    if (commands.length === 0) {
      throw new TemplateError('EMPTY_TEMPLATE', name);
    }
    this.templates.set(name, [...commands]);
    return { name, commands: [...commands] };
  }

  remove(name: string): void {
    if (!this.templates.delete(name)) {
      throw new TemplateError('TEMPLATE_NOT_FOUND', name);
    }
  }

  clear(): void {
    this.templates.clear();
  }

  isEmpty(): boolean {
    return this.templates.size === 0;
  }

  toFile(): TemplatesFile {
    return { templates: Object.fromEntries(this.templates) };
  }

  replaceAll(file: TemplatesFile): void {
    this.templates = new Map(Object.entries(file.templates));
  }
}

/**
 * Commands from an edited buffer: one per line, `#` lines and blanks skipped.
 */
export function parseTemplateCommands(text: string): string[] {
  return readListLines(text);
}
