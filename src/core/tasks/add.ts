/**
 * Task creation.
 */

import { TeamTaskError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Task } from '../../types/task.js';
import type { RecordStore } from '../../store/record-store.js';
import { formatCalendarDate, isCalendarDate } from '../dates.js';
import { getLogger } from '../logger.js';

/** Options for adding a task. */
export interface AddTaskOptions {
  /** Assignee; must be a registered user. */
  username: string;
  title: string;
  description: string;
  /** Due date (YYYY-MM-DD). */
  dueDate: string;
}

/** Validate a YYYY-MM-DD due date. */
export function validateDueDate(dueDate: string): void {
  if (!isCalendarDate(dueDate)) {
    throw new TeamTaskError(
      ExitCode.INVALID_INPUT,
      'Invalid date format. Use YYYY-MM-DD.',
    );
  }
}

/** Ensure a username is registered. */
export function validateAssignee(username: string, users: ReadonlyMap<string, string>): void {
  if (!users.has(username)) {
    throw new TeamTaskError(
      ExitCode.NOT_FOUND,
      `User '${username}' does not exist.`,
    );
  }
}

/**
 * Add a new, uncompleted task assigned today.
 */
export async function addTask(
  options: AddTaskOptions,
  store: RecordStore,
  now: Date = new Date(),
): Promise<Task> {
  validateAssignee(options.username, await store.loadUsers());
  validateDueDate(options.dueDate);

  const task: Task = {
    username: options.username,
    title: options.title,
    description: options.description,
    assignedDate: formatCalendarDate(now),
    dueDate: options.dueDate,
    completed: 'No',
  };
  await store.appendTask(task);

  getLogger('tasks').info({ username: task.username, title: task.title }, 'Task added');
  return task;
}
