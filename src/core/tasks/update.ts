/**
 * Task editing: reassignment and due date changes.
 */

import { TeamTaskError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { StoredTask } from '../../types/task.js';
import type { RecordStore } from '../../store/record-store.js';
import { findTask } from './lookup.js';
import { validateAssignee, validateDueDate } from './add.js';
import { getLogger } from '../logger.js';

/** Options for updating a task. */
export interface UpdateTaskOptions {
  taskId: number;
  /** Restrict to tasks assigned to this user. */
  owner?: string;
  /** New assignee; must be a registered user. */
  username?: string;
  /** New due date (YYYY-MM-DD). */
  dueDate?: string;
}

/**
 * Update an uncompleted task. Completed tasks cannot be edited.
 * The assignee is checked before the due date.
 */
export async function updateTask(options: UpdateTaskOptions, store: RecordStore): Promise<StoredTask> {
  const tasks = await store.loadTasks();
  const task = findTask(tasks, options.taskId, options.owner);

  if (task.completed === 'Yes') {
    throw new TeamTaskError(ExitCode.TASK_COMPLETED, 'Cannot edit completed task.');
  }

  if (options.username !== undefined) {
    validateAssignee(options.username, await store.loadUsers());
  }
  if (options.dueDate !== undefined) {
    validateDueDate(options.dueDate);
  }

  if (options.username !== undefined) task.username = options.username;
  if (options.dueDate !== undefined) task.dueDate = options.dueDate;
  await store.saveTasks(tasks);

  getLogger('tasks').info(
    { taskId: task.id, username: options.username, dueDate: options.dueDate },
    'Task updated',
  );
  return task;
}
