/**
 * CLI init command - create the data files.
 *
 * Thin handler: call the store -> format output.
 */

import { Command } from 'commander';
import { basename } from 'node:path';
import { getCliContext } from '../context.js';
import { cliOutput, handleCommandError } from '../renderers/index.js';

/**
 * Register the init command.
 */
export function registerInitCommand(program: Command): void {
  program
    .command('init')
    .description('Seed the users file with the administrator and create an empty tasks file')
    .action(async () => {
      try {
        const { store, paths } = getCliContext();
        const result = await store.initStore();

        const lines: string[] = [];
        if (result.usersSeeded) lines.push(`Created ${basename(paths.usersPath)} with the administrator account`);
        if (result.tasksCreated) lines.push(`Created ${basename(paths.tasksPath)}`);
        if (lines.length === 0) lines.push('Data files already exist');

        cliOutput(
          { ...result, usersPath: paths.usersPath, tasksPath: paths.tasksPath },
          { operation: 'store.init', human: lines.join('\n') },
        );
      } catch (err) {
        handleCommandError(err, 'store.init');
      }
    });
}
