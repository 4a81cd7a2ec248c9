/**
 * CLI stats command - task and user statistics without writing reports.
 */

import { Command } from 'commander';
import { getCliContext } from '../context.js';
import { cliOutput, handleCommandError } from '../renderers/index.js';
import { renderStats } from '../renderers/system.js';
import { computeTaskStats, computeUserStats } from '../../core/stats/index.js';

/**
 * Register the stats command.
 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Task statistics and per-user breakdown')
    .action(async () => {
      try {
        const { store } = getCliContext();
        const tasks = await store.loadTasks();
        const users = await store.loadUsers();
        const now = new Date();
        const taskStats = computeTaskStats(tasks, now);
        const userStats = computeUserStats(tasks, users, now);
        cliOutput(
          { taskStats, userStats },
          { operation: 'system.stats', human: renderStats(taskStats, userStats) },
        );
      } catch (err) {
        handleCommandError(err, 'system.stats');
      }
    });
}
