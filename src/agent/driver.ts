/**
 * Command Driver
 *
 * Runs the model's suggested commands after a human says yes.
 * Commands run one at a time in the given order; a failing command stops the
 * pass and its error propagates to the caller.
 */

import type { AgentConsole } from '../output/console.js';
import type { Confirm, Execute } from './types.js';

export const CONFIRM_QUESTION = 'Execute these commands autonomously?';

/**
 * Whether a confirmation answer authorizes execution. Only "y" does, in either case.
 */
export function isAffirmative(answer: string): boolean {
  return answer.trim().toLowerCase() === 'y';
}

export async function driveCommands(
  commands: readonly string[],
  confirm: Confirm,
  execute: Execute,
  console: AgentConsole
): Promise<void> {
  if (commands.length === 0) return;

  console.print();
  console.print('Suggested Autonomous Commands:');
  commands.forEach((command, index) => console.print(` ${index + 1}. ${command}`));

  if (!(await confirm(CONFIRM_QUESTION))) {
    console.info('Skipped autonomous commands.');
    return;
  }

  console.info('Taking the wheel...');
  for (const command of commands) {
    console.print(`-> ${command}`);
    await execute(command);
  }
}
