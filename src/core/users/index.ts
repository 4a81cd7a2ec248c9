/**
 * User accounts: registration, login and admin checks.
 *
 * Passwords are stored and compared in plain text.
 */

import { TeamTaskError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { AdminConfig } from '../../types/config.js';
import type { RecordStore } from '../../store/record-store.js';
import { getLogger } from '../logger.js';

/** Register a new user. Usernames are unique and non-blank. */
export async function registerUser(
  username: string,
  password: string,
  store: RecordStore,
): Promise<void> {
  if (username.trim() === '') {
    throw new TeamTaskError(ExitCode.INVALID_INPUT, 'Username is required.');
  }
  const users = await store.loadUsers();
  if (users.has(username)) {
    throw new TeamTaskError(
      ExitCode.USER_EXISTS,
      `Username '${username}' already exists.`,
      { fix: 'Choose another username' },
    );
  }

  await store.appendUser(username, password);
  getLogger('users').info({ username }, 'User registered');
}

/**
 * Check credentials. Returns the username on success.
 */
export async function authenticate(
  username: string,
  password: string,
  store: RecordStore,
): Promise<string> {
  const users = await store.loadUsers();
  const stored = users.get(username);

  if (stored === undefined) {
    getLogger('users').warn({ username }, 'Login with unknown username');
    throw new TeamTaskError(ExitCode.AUTH_FAILED, `Username '${username}' does not exist.`);
  }
  if (stored !== password) {
    getLogger('users').warn({ username }, 'Login with wrong password');
    throw new TeamTaskError(ExitCode.AUTH_FAILED, 'Incorrect password.');
  }

  getLogger('users').info({ username }, 'Login');
  return username;
}

/** Whether a user has the administrator menu. */
export function isAdmin(username: string, admin: Pick<AdminConfig, 'username'>): boolean {
  return username === admin.username;
}
