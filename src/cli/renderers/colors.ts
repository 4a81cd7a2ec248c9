/**
 * Terminal color utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when stdout is not a terminal. Report and task
 * box text is never colored, so it stays identical to the files on disk.
 */

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const NC = ansi('\x1b[0m');  // reset
export const RED = ansi('\x1b[0;31m');
