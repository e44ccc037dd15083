import { ConfigManager } from '../core/config.js';
import { ProjectLibrary } from '../library/library.js';
import { launchProgram } from '../process/launcher.js';
import type { ProgramLauncher } from '../process/types.js';
import type { ConfirmFn } from '../resolver/types.js';
import { resolveProjectName } from '../resolver/name-resolver.js';
import { TemplateRegistry } from '../templates/registry.js';
import { getTemplatesPath } from '../utils/platform.js';
import { askDialog, askQuestion } from './terminal.js';

/**
 * Everything a command handler touches outside its own logic.
 */
export interface CommandContext {
  config: ConfigManager;
  launcher: ProgramLauncher;
  confirm: ConfirmFn;
  ask: (prompt: string) => Promise<string>;
  print: (line?: string) => void;
}

export function createDefaultContext(globalDir?: string): CommandContext {
  return {
    config: new ConfigManager(globalDir),
    launcher: launchProgram,
    confirm: (prompt, defaultAnswer) => askDialog(prompt, defaultAnswer),
    ask: (prompt) => askQuestion(`${prompt} `),
    print: (line = '') => console.log(line),
  };
}

export function openLibrary(ctx: CommandContext): ProjectLibrary {
  const { options } = ctx.config.get();
  return new ProjectLibrary(options.projectsDirectory, { displayHidden: options.displayHidden });
}

export function loadTemplates(ctx: CommandContext): TemplateRegistry {
  return TemplateRegistry.load(getTemplatesPath(ctx.config.getGlobalDir()));
}

/**
 * Resolve a typed name against the library using the configured recent
 * and autocomplete settings.
 */
export function resolveName(ctx: CommandContext, library: ProjectLibrary, typed: string): Promise<string | null> {
  const { recent, autocomplete } = ctx.config.get();
  return resolveProjectName(typed, library.getNames(), {
    recent: recent.recentProject,
    recentEnabled: recent.enabled,
    autocompleteEnabled: autocomplete.enabled,
    alwaysAccept: autocomplete.alwaysAccept,
    confirm: ctx.confirm,
  });
}
