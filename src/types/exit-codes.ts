/**
 * teamtask exit codes.
 * 0 = success, 1-9 = general errors, 10-19 = account errors, 20-29 = task errors.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  VALIDATION_ERROR = 6,
  CONFIG_ERROR = 8,

  // === ACCOUNT ERRORS (10-19) ===
  AUTH_FAILED = 10,
  USER_EXISTS = 11,

  // === TASK ERRORS (20-29) ===
  TASK_COMPLETED = 20,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
