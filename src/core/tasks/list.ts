/**
 * Task listing with filters.
 */

import type { StoredTask } from '../../types/task.js';
import type { RecordStore } from '../../store/record-store.js';

/** Filter options for listing tasks. */
export interface ListTasksOptions {
  /** Only tasks assigned to this user. */
  username?: string;
  /** Only completed tasks. */
  completed?: boolean;
}

/** List tasks in stored order. */
export async function listTasks(options: ListTasksOptions, store: RecordStore): Promise<StoredTask[]> {
  const tasks = await store.loadTasks();
  return tasks.filter(
    (t) =>
      (options.username === undefined || t.username === options.username)
      && (!options.completed || t.completed === 'Yes'),
  );
}
