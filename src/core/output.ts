/**
 * JSON envelope formatter for --json output.
 *
 * Every envelope carries `success`, the result (or error) and a `_meta`
 * block with the operation name, a timestamp and a request id.
 */

import { randomUUID } from 'node:crypto';
import { TeamTaskError } from './errors.js';

/** Envelope metadata. */
export interface EnvelopeMeta {
  operation: string;
  timestamp: string;
  requestId: string;
}

function createMeta(operation: string): EnvelopeMeta {
  return {
    operation,
    timestamp: new Date().toISOString(),
    requestId: randomUUID(),
  };
}

/**
 * Replacer that serializes Maps as plain objects, so per-user stats keep
 * their user order in the output.
 */
function mapReplacer(_key: string, value: unknown): unknown {
  return value instanceof Map ? Object.fromEntries(value) : value;
}

/** Format a successful result as an envelope. */
export function formatSuccess<T>(data: T, message?: string, operation?: string): string {
  const envelope = {
    _meta: createMeta(operation ?? 'cli.output'),
    success: true as const,
    result: data,
    ...(message ? { message } : {}),
  };
  return JSON.stringify(envelope, mapReplacer);
}

/** Format an error as an envelope. */
export function formatError(error: TeamTaskError, operation?: string): string {
  const envelope = {
    _meta: createMeta(operation ?? 'cli.output'),
    success: false as const,
    result: null,
    ...error.toJSON(),
  };
  return JSON.stringify(envelope);
}
