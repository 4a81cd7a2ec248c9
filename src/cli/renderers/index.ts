/**
 * Central output dispatch for CLI commands.
 *
 * Commands call:
 *   cliOutput(data, { operation, human })
 *
 * which prints either the JSON envelope of `data` or the human text,
 * depending on --json.
 */

import { isJsonFormat } from '../context.js';
import { formatSuccess, formatError } from '../../core/output.js';
import { TeamTaskError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import { NC, RED } from './colors.js';

export interface CliOutputOptions {
  /** Operation name for the envelope _meta. */
  operation: string;
  /** Optional success message for the JSON envelope. */
  message?: string;
  /** Human-readable rendering of the same data. */
  human: string;
}

/** Output data to stdout in the resolved format. */
export function cliOutput(data: unknown, opts: CliOutputOptions): void {
  if (isJsonFormat()) {
    console.log(formatSuccess(data, opts.message, opts.operation));
    return;
  }
  if (opts.human) {
    console.log(opts.human);
  }
}

/**
 * Output an error in the resolved format to stderr.
 * For human output, the fix hint follows on its own line.
 */
export function cliError(error: TeamTaskError, operation?: string): void {
  if (isJsonFormat()) {
    console.error(formatError(error, operation));
    return;
  }
  console.error(`${RED}Error:${NC} ${error.message}`);
  if (error.fix) {
    console.error(`Fix: ${error.fix}`);
  }
}

/**
 * Command catch block: report a TeamTaskError and set its exit code.
 * Anything else is rethrown.
 */
export function handleCommandError(err: unknown, operation: string): void {
  if (err instanceof TeamTaskError) {
    getLogger('cli').error({ operation, code: err.code, err }, err.message);
    cliError(err, operation);
    process.exitCode = err.code;
    return;
  }
  throw err;
}
