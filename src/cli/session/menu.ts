/**
 * Interactive session: login followed by the main menu loop.
 */

import { isAdmin } from '../../core/users/index.js';
import { TeamTaskError } from '../../core/errors.js';
import { getLogger } from '../../core/logger.js';
import {
  addTaskAction,
  deleteAction,
  displayStatisticsAction,
  generateReportsAction,
  registerAction,
  viewAllAction,
  viewCompletedAction,
  viewMineAction,
  type SessionContext,
  type SessionDeps,
} from './actions.js';
import { login } from './login.js';
import { InputClosedError, type SessionIO } from './prompter.js';

export interface MenuItem {
  key: string;
  label: string;
  adminOnly: boolean;
  run?: (ctx: SessionContext) => Promise<void>;
}

/** Menu entries in display order. An entry without `run` ends the session. */
export const MENU_ITEMS: readonly MenuItem[] = [
  { key: 'r', label: 'register user', adminOnly: true, run: registerAction },
  { key: 'a', label: 'add task', adminOnly: false, run: addTaskAction },
  { key: 'va', label: 'view all tasks', adminOnly: false, run: viewAllAction },
  { key: 'vm', label: 'view my tasks', adminOnly: false, run: viewMineAction },
  { key: 'vc', label: 'view completed tasks', adminOnly: true, run: viewCompletedAction },
  { key: 'del', label: 'delete a task', adminOnly: true, run: deleteAction },
  { key: 'ds', label: 'display statistics', adminOnly: true, run: displayStatisticsAction },
  { key: 'gr', label: 'generate reports', adminOnly: true, run: generateReportsAction },
  { key: 'e', label: 'exit', adminOnly: false },
];

/** Menu entries visible to a user. */
export function menuFor(admin: boolean): MenuItem[] {
  return MENU_ITEMS.filter((item) => admin || !item.adminOnly);
}

/**
 * Run the menu loop until the user exits.
 * A TeamTaskError from an action is printed and the menu is shown again.
 */
export async function runMenu(ctx: SessionContext): Promise<void> {
  const { io } = ctx;
  const items = menuFor(isAdmin(ctx.user, ctx.config.admin));
  const log = getLogger('session');

  for (;;) {
    io.print('\nPlease select one of the following options:');
    for (const item of items) {
      io.print(`${item.key} - ${item.label}`);
    }
    const key = (await io.prompter.ask(': ')).trim().toLowerCase();
    const item = items.find((i) => i.key === key);

    if (!item) {
      io.print('Invalid option. Please select a valid option.');
      continue;
    }
    if (!item.run) {
      io.print(`\nGoodbye, ${ctx.user}. See you next time.`);
      return;
    }

    try {
      await item.run(ctx);
    } catch (err) {
      if (!(err instanceof TeamTaskError)) throw err;
      log.warn({ action: item.key, code: err.code }, err.message);
      io.print(err.message);
    }
  }
}

/**
 * Log in and run the menu. End of input at any prompt ends the session.
 * Returns the username that logged in, or null if input ended first.
 */
export async function runSession(deps: SessionDeps, io: SessionIO): Promise<string | null> {
  const log = getLogger('session');
  let user: string | null = null;
  try {
    user = await login(io, deps.store);
    log.info({ user }, 'Session started');
    await runMenu({ ...deps, io, user });
    log.info({ user }, 'Session ended');
    return user;
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
    log.info({ user }, 'Input closed; session ended');
    return user;
  } finally {
    io.prompter.close();
  }
}
