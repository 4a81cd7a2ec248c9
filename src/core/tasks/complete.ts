/**
 * Task completion.
 */

import type { StoredTask } from '../../types/task.js';
import type { RecordStore } from '../../store/record-store.js';
import { findTask } from './lookup.js';
import { getLogger } from '../logger.js';

/** Options for completing a task. */
export interface CompleteTaskOptions {
  taskId: number;
  /** Restrict to tasks assigned to this user. */
  owner?: string;
}

/**
 * Mark a task completed and rewrite the task file.
 * Completing an already completed task leaves it completed.
 */
export async function completeTask(options: CompleteTaskOptions, store: RecordStore): Promise<StoredTask> {
  const tasks = await store.loadTasks();
  const task = findTask(tasks, options.taskId, options.owner);

  task.completed = 'Yes';
  await store.saveTasks(tasks);

  getLogger('tasks').info({ taskId: task.id, title: task.title }, 'Task completed');
  return task;
}
