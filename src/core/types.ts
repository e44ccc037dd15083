import { z } from 'zod';
import {
  getDefaultEditor,
  getDefaultProjectsDir,
  getDefaultShell,
  getShellCommandArgs,
  isGuiEditor,
} from '../utils/platform.js';

// ===== Configuration =====

export const ProfileSchema = z.object({
  editor: z.string().default(''),
  editorArgs: z.array(z.string()).default([]),
  editorForkMode: z.boolean().default(false),
  shell: z.string().default(''),
  shellArgs: z.array(z.string()).default([]),
});

export type Profile = z.infer<typeof ProfileSchema>;

/**
 * Profile derived from the current platform: `$VISUAL`/`$EDITOR` and `$SHELL`
 */
export function defaultProfile(): Profile {
  const editor = getDefaultEditor();
  const gui = isGuiEditor(editor);
  const shell = getDefaultShell();
  return {
    editor,
    editorArgs: gui ? ['.'] : [],
    editorForkMode: gui,
    shell,
    shellArgs: getShellCommandArgs(shell),
  };
}

export const ShelfConfigSchema = z.object({
  version: z.string().default('1'),
  options: z.object({
    projectsDirectory: z.string().default(() => getDefaultProjectsDir()),
    currentProfile: z.string().default('default'),
    displayHidden: z.boolean().default(false),
  }).default({}),
  profiles: z.record(ProfileSchema).default(() => ({ default: defaultProfile() })),
  recent: z.object({
    enabled: z.boolean().default(true),
    recentProject: z.string().default(''),
  }).default({}),
  autocomplete: z.object({
    enabled: z.boolean().default(true),
    alwaysAccept: z.boolean().default(true),
  }).default({}),
});

export type ShelfConfig = z.infer<typeof ShelfConfigSchema>;

/** Partial shape accepted as load overrides */
export type ShelfConfigOverrides = {
  options?: Partial<ShelfConfig['options']>;
  recent?: Partial<ShelfConfig['recent']>;
  autocomplete?: Partial<ShelfConfig['autocomplete']>;
  profiles?: Record<string, Profile>;
};

// ===== Templates =====

export const TemplatesFileSchema = z.object({
  templates: z.record(z.array(z.string())).default({}),
});

export type TemplatesFile = z.infer<typeof TemplatesFileSchema>;

// ===== Backup =====

export const BackupSchema = z.object({
  config: ShelfConfigSchema,
  templates: TemplatesFileSchema,
});

export type Backup = z.infer<typeof BackupSchema>;
