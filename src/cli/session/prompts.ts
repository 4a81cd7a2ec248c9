/**
 * Validated prompts shared by menu actions.
 */

import type { SessionIO } from './prompter.js';

/** Sentinel returned when the user backs out of a task selection. */
export const BACK_TO_MENU = -1;

/** Parse a whole (optionally signed) integer; null for anything else. */
export function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) return null;
  return Number(trimmed);
}

/**
 * Ask for a task number between 1 and `count`, re-asking until the answer
 * is valid. Returns BACK_TO_MENU when the user enters -1.
 */
export async function promptTaskNumber(io: SessionIO, count: number): Promise<number> {
  for (;;) {
    const choice = parseInteger(await io.prompter.ask('Enter task number (-1 to main menu): '));
    if (choice === null) {
      io.print('Please enter a valid number.');
      continue;
    }
    if (choice === BACK_TO_MENU) return BACK_TO_MENU;
    if (choice >= 1 && choice <= count) return choice;
    io.print('Invalid task number. Try again.');
  }
}
