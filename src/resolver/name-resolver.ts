import type { CompletionResult, ResolveOptions } from './types.js';

export const RECENT_SENTINEL = '-';

/**
 * Exact match first, then the first case-insensitive prefix match in
 * the order the names are given.
 */
export function suggestCompletion(word: string, words: readonly string[]): CompletionResult {
  if (words.includes(word)) {
    return { kind: 'found' };
  }

  const lower = word.toLowerCase();
  const similar = words.find(entry => entry.toLowerCase().startsWith(lower));
  return similar === undefined ? { kind: 'nothing' } : { kind: 'similar', name: similar };
}

/**
 * Map what the user typed to a project name.
 *
 * Returns null when nothing matches or a suggestion was declined. For the
 * `-` sentinel the recent project is returned as-is, which may be an empty
 * string; callers treat that as not found.
 */
export async function resolveProjectName(
  typed: string,
  knownNames: readonly string[],
  options: ResolveOptions,
): Promise<string | null> {
  if (typed === RECENT_SENTINEL && options.recentEnabled) {
    return options.recent ?? '';
  }

  if (!options.autocompleteEnabled) {
    return typed;
  }

  const suggestion = suggestCompletion(typed, knownNames);
  switch (suggestion.kind) {
    case 'found':
      return typed;
    case 'nothing':
      return null;
    case 'similar': {
      if (options.alwaysAccept) {
        return suggestion.name;
      }
      const accepted = await options.confirm(`Did you mean '${suggestion.name}'?`, true);
      return accepted ? suggestion.name : null;
    }
  }
}
