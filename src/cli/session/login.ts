/**
 * Interactive login loop.
 */

import type { RecordStore } from '../../store/record-store.js';
import { authenticate } from '../../core/users/index.js';
import { TeamTaskError } from '../../core/errors.js';
import type { SessionIO } from './prompter.js';

/**
 * Ask for credentials until they match a registered user.
 * Returns the logged-in username.
 */
export async function login(io: SessionIO, store: RecordStore): Promise<string> {
  io.print('Welcome to the Task Manager. Please log in.');

  for (;;) {
    const username = (await io.prompter.ask('Enter your username: ')).trim();
    const password = (await io.prompter.ask('Enter your password: ')).trim();
    try {
      await authenticate(username, password, store);
      io.print(`Login successful. Welcome, ${username}.`);
      return username;
    } catch (err) {
      if (!(err instanceof TeamTaskError)) throw err;
      io.print(`${err.message} Try again.`);
    }
  }
}
