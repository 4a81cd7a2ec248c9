/**
 * teamtask error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for teamtask operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class TeamTaskError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TeamTaskError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for envelope output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix ? { fix: this.fix } : {}),
      },
    };
  }
}

/** Narrow an unknown thrown value to a Node.js errno exception. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
