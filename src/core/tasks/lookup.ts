/**
 * Task lookup by id, optionally restricted to one assignee.
 */

import { TeamTaskError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { StoredTask } from '../../types/task.js';

/**
 * Find a task by id. When `owner` is given, only that user's tasks match.
 * Throws NOT_FOUND otherwise.
 */
export function findTask(tasks: readonly StoredTask[], taskId: number, owner?: string): StoredTask {
  const task = tasks.find((t) => t.id === taskId);
  if (!task || (owner !== undefined && task.username !== owner)) {
    throw new TeamTaskError(
      ExitCode.NOT_FOUND,
      owner !== undefined ? `Task ${taskId} is not assigned to ${owner}` : `Task not found: ${taskId}`,
      { fix: `Use 'teamtask list' to see task numbers` },
    );
  }
  return task;
}
