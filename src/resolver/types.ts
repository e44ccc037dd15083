/** Ask the user a yes/no question; resolves with the answer */
export type ConfirmFn = (prompt: string, defaultAnswer: boolean) => Promise<boolean>;

export type CompletionResult =
  | { kind: 'found' }
  | { kind: 'similar'; name: string }
  | { kind: 'nothing' };

export interface ResolveOptions {
  /** Last opened project, returned for the `-` sentinel */
  recent?: string;
  recentEnabled: boolean;
  autocompleteEnabled: boolean;
  /** Take the first prefix match without asking */
  alwaysAccept: boolean;
  confirm: ConfirmFn;
}
