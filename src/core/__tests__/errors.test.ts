/**
 * Tests for TeamTaskError and the JSON envelopes.
 */

import { describe, it, expect } from 'vitest';
import { TeamTaskError, isErrnoException } from '../errors.js';
import { formatError, formatSuccess } from '../output.js';
import { ExitCode, getExitCodeName } from '../../types/exit-codes.js';

describe('TeamTaskError', () => {
  it('carries code, message and fix', () => {
    const err = new TeamTaskError(ExitCode.NOT_FOUND, 'Task not found: 9', { fix: 'List tasks first' });
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('TeamTaskError');
    expect(err.code).toBe(4);
    expect(err.message).toBe('Task not found: 9');
    expect(err.fix).toBe('List tasks first');
  });

  it('keeps the cause', () => {
    const cause = new Error('disk full');
    expect(new TeamTaskError(ExitCode.FILE_ERROR, 'write failed', { cause }).cause).toBe(cause);
  });

  it('serializes without fix when none was given', () => {
    expect(new TeamTaskError(ExitCode.AUTH_FAILED, 'Incorrect password.').toJSON()).toEqual({
      success: false,
      error: { code: 10, name: 'AUTH_FAILED', message: 'Incorrect password.' },
    });
  });
});

describe('getExitCodeName', () => {
  it('names known codes', () => {
    expect(getExitCodeName(ExitCode.TASK_COMPLETED)).toBe('TASK_COMPLETED');
    expect(getExitCodeName(ExitCode.SUCCESS)).toBe('SUCCESS');
  });
});

describe('isErrnoException', () => {
  it('recognizes errors with a code', () => {
    const err = Object.assign(new Error('missing'), { code: 'ENOENT' });
    expect(isErrnoException(err)).toBe(true);
    expect(isErrnoException(new Error('plain'))).toBe(false);
    expect(isErrnoException('ENOENT')).toBe(false);
  });
});

describe('formatSuccess', () => {
  it('wraps the result with metadata', () => {
    const envelope: unknown = JSON.parse(formatSuccess({ total: 2 }, 'Done', 'tasks.list'));
    expect(envelope).toMatchObject({
      _meta: { operation: 'tasks.list' },
      success: true,
      result: { total: 2 },
      message: 'Done',
    });
  });

  it('serializes maps as objects in insertion order', () => {
    const users = new Map([['bob', 1], ['alice', 2]]);
    const json = formatSuccess({ users });
    expect(json).toContain('"result":{"users":{"bob":1,"alice":2}}');
  });
});

describe('formatError', () => {
  it('wraps the error with metadata', () => {
    const err = new TeamTaskError(ExitCode.USER_EXISTS, "Username 'bob' already exists.");
    const envelope: unknown = JSON.parse(formatError(err, 'users.register'));
    expect(envelope).toMatchObject({
      _meta: { operation: 'users.register' },
      success: false,
      result: null,
      error: { code: 11, name: 'USER_EXISTS', message: "Username 'bob' already exists." },
    });
  });
});
