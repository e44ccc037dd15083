export { resolveProjectName, suggestCompletion, RECENT_SENTINEL } from './name-resolver.js';
export type { ConfirmFn, CompletionResult, ResolveOptions } from './types.js';
