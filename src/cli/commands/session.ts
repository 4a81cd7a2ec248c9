/**
 * CLI session command: interactive login and menu.
 * This is the default command when none is given.
 */

import { Command } from 'commander';
import { getCliContext } from '../context.js';
import { handleCommandError } from '../renderers/index.js';
import { runSession } from '../session/menu.js';
import { createReadlinePrompter } from '../session/prompter.js';

/**
 * Register the session command.
 */
export function registerSessionCommand(program: Command): void {
  program
    .command('session', { isDefault: true })
    .description('Log in and manage tasks from an interactive menu')
    .action(async () => {
      try {
        const { store, config, paths } = getCliContext();
        await runSession(
          { store, config, paths },
          { prompter: createReadlinePrompter(), print: (text) => console.log(text) },
        );
      } catch (err) {
        handleCommandError(err, 'session.run');
      }
    });
}
