/**
 * Terminal helpers: yes/no and free-text prompts over readline, and the
 * small set of line formats the commands print.
 */

import * as readline from 'readline';

export interface TerminalIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

function stdio(): TerminalIO {
  return { input: process.stdin, output: process.stdout };
}

/**
 * Ask a question and resolve with the raw answer. Resolves with an empty
 * string when the input ends before a line arrives.
 */
export function askQuestion(prompt: string, io: TerminalIO = stdio()): Promise<string> {
  const rl = readline.createInterface({ input: io.input, output: io.output, terminal: false });

  return new Promise((resolve) => {
    let answered = false;
    rl.once('close', () => {
      if (!answered) resolve('');
    });
    rl.question(prompt, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

export function parseYesNo(answer: string, defaultAnswer: boolean): boolean {
  switch (answer.trim().toLowerCase()) {
    case 'y':
    case 'yes':
      return true;
    case 'n':
    case 'no':
      return false;
    default:
      return defaultAnswer;
  }
}

export async function askDialog(prompt: string, defaultAnswer: boolean, io: TerminalIO = stdio()): Promise<boolean> {
  const hint = defaultAnswer ? '[Y/n]' : '[y/N]';
  const answer = await askQuestion(`${prompt} ${hint} `, io);
  return parseYesNo(answer, defaultAnswer);
}

export function formatTitle(title: string): string[] {
  return [title, '─'.repeat(Math.max(title.length, 20))];
}

export function formatProgress(command: string, current: number, total: number): string {
  return `[${current}/${total}] ${command}`;
}
