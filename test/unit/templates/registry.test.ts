import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { TemplateRegistry, parseTemplateCommands } from '../../../src/templates/registry.js';
import { TemplateError } from '../../../src/core/errors.js';

describe('TemplateRegistry', () => {
  let tmpDir: string;
  let filePath: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'shelf-templates-'));
    filePath = path.join(tmpDir, 'templates.yaml');
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', () => {
    const registry = TemplateRegistry.load(filePath);
    expect(registry.isEmpty()).toBe(true);
    expect(registry.list()).toEqual([]);
  });

  it('adds and returns templates', () => {
    const registry = new TemplateRegistry(filePath);
    const created = registry.add('node', ['npm init -y', 'git init']);

    expect(created).toEqual({ name: 'node', commands: ['npm init -y', 'git init'] });
    expect(registry.has('node')).toBe(true);
    expect(registry.get('node')).toEqual(created);
    expect(registry.get('other')).toBeUndefined();
  });

  it('hands out copies of the command list', () => {
    const registry = new TemplateRegistry(filePath);
    registry.add('node', ['git init']);

    registry.get('node')?.commands.push('rm -rf /');
    expect(registry.get('node')?.commands).toEqual(['git init']);
  });

  it('refuses duplicate and empty templates', () => {
    const registry = new TemplateRegistry(filePath);
    registry.add('node', ['git init']);

    expect(() => registry.add('node', ['x'])).toThrow("Template 'node' already exists");
    expect(() => registry.add('blank', [])).toThrow("Template 'blank' has no commands");
  });

  it('removes templates and reports unknown ones', () => {
    const registry = new TemplateRegistry(filePath);
    registry.add('node', ['git init']);

    registry.remove('node');
    expect(registry.has('node')).toBe(false);
    expect(() => registry.remove('node')).toThrow(TemplateError);
  });

  it('clears everything', () => {
    const registry = new TemplateRegistry(filePath);
    registry.add('a', ['x']);
    registry.add('b', ['y']);

    registry.clear();
    expect(registry.isEmpty()).toBe(true);
  });

  it('round-trips through YAML keeping order', () => {
    const registry = new TemplateRegistry(filePath);
    registry.add('zeta', ['z1']);
    registry.add('alpha', ['a1', 'a2']);
    registry.save();

    const reloaded = TemplateRegistry.load(filePath);
    expect(reloaded.list()).toEqual(['zeta', 'alpha']);
    expect(reloaded.get('alpha')?.commands).toEqual(['a1', 'a2']);
  });

  it('reads a hand-written file', () => {
    fs.writeFileSync(filePath, 'templates:\n  go:\n    - go mod init example\n    - git add .\n');

    const registry = TemplateRegistry.load(filePath);
    expect(registry.get('go')?.commands).toEqual(['go mod init example', 'git add .']);
  });

  it('treats an empty file as no templates', () => {
    fs.writeFileSync(filePath, '');
    expect(TemplateRegistry.load(filePath).isEmpty()).toBe(true);
  });

  it('rejects a file with the wrong shape', () => {
    fs.writeFileSync(filePath, 'templates:\n  go: go mod init\n');

    expect(() => TemplateRegistry.load(filePath)).toThrow(TemplateError);
    try {
      TemplateRegistry.load(filePath);
    } catch (err) {
      expect((err as TemplateError).code).toBe('STORE_ERROR');
    }
  });

  it('exposes the file snapshot', () => {
    const registry = new TemplateRegistry(filePath);
    registry.add('a', ['x']);
    expect(registry.toFile()).toEqual({ templates: { a: ['x'] } });
    expect(registry.getPath()).toBe(filePath);
  });
});

describe('parseTemplateCommands', () => {
  it('keeps one command per line and drops comments and blanks', () => {
    const text = '# Write your commands here\nnpm init -y\n\n  git init  \n#skip\r\necho done\n';
    expect(parseTemplateCommands(text)).toEqual(['npm init -y', 'git init', 'echo done']);
  });
});
