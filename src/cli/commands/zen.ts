/**
 * `shelf zen` — A few guiding lines.
 */

import { Command } from 'commander';
import type { CommandContext } from '../context.js';

export const ZEN_LINES: readonly string[] = [
  'One directory, one project.',
  'A name is worth choosing carefully.',
  'Templates repeat what hands forget.',
  'A failed scaffold leaves nothing behind.',
  'The recent project is one dash away.',
  'Ignore what you do not want to see.',
  'Delete with intent, never by accident.',
  'Editors open, shells return.',
  'Back up before you tinker.',
  'Less bookkeeping, more building.',
];

export function createZenCommand(ctx: CommandContext): Command {
  return new Command('zen')
    .description('Print the zen of shelf')
    .action(() => {
      handleZen(ctx);
    });
}

export function handleZen(ctx: CommandContext): void {
  ctx.print('========  THE ZEN OF SHELF  ========');
  for (const line of ZEN_LINES) {
    ctx.print(` ${line}`);
  }
}
