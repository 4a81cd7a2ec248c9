/**
 * CLI list command.
 */

import { Command } from 'commander';
import { getCliContext } from '../context.js';
import { cliOutput, handleCommandError } from '../renderers/index.js';
import { renderTaskList } from '../renderers/tasks.js';
import { listTasks } from '../../core/tasks/index.js';

interface ListCommandOptions {
  user?: string;
  completed?: boolean;
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List tasks with optional filters')
    .option('--user <name>', 'Only tasks assigned to this user')
    .option('--completed', 'Only completed tasks')
    .action(async (opts: ListCommandOptions) => {
      try {
        const { store } = getCliContext();
        const tasks = await listTasks({ username: opts.user, completed: opts.completed }, store);
        cliOutput(
          { tasks, total: tasks.length },
          {
            operation: 'tasks.list',
            message: tasks.length === 0 ? 'No tasks found' : undefined,
            human: tasks.length === 0 ? 'No tasks to display.' : renderTaskList(tasks),
          },
        );
      } catch (err) {
        handleCommandError(err, 'tasks.list');
      }
    });
}
