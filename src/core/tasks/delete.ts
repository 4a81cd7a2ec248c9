/**
 * Task deletion.
 */

import type { StoredTask } from '../../types/task.js';
import type { RecordStore } from '../../store/record-store.js';
import { findTask } from './lookup.js';
import { getLogger } from '../logger.js';

/** Options for deleting a task. */
export interface DeleteTaskOptions {
  taskId: number;
}

/**
 * Remove a task and rewrite the task file.
 * Later tasks move up one position, so their ids shift on the next load.
 */
export async function deleteTask(options: DeleteTaskOptions, store: RecordStore): Promise<StoredTask> {
  const tasks = await store.loadTasks();
  const task = findTask(tasks, options.taskId);

  await store.saveTasks(tasks.filter((t) => t !== task));

  getLogger('tasks').info({ taskId: task.id, title: task.title }, 'Task deleted');
  return task;
}
