/**
 * RecordStore: storage abstraction for users and tasks.
 *
 * Core modules operate on whole collections and follow a
 * read-modify-write pattern: load everything, change it in memory,
 * write everything back. The RecordStore hides where the records live,
 * so core modules and tests accept a RecordStore instead of paths.
 */

import type { StoredTask, Task, UserTable } from '../types/task.js';

/** What initStore() had to create. */
export interface StoreInitResult {
  usersSeeded: boolean;
  tasksCreated: boolean;
}

export interface RecordStore {
  /**
   * Load registered users in file order.
   * A missing users file is seeded with the default admin account.
   */
  loadUsers(): Promise<UserTable>;

  /** Add one user record after the existing ones. */
  appendUser(username: string, password: string): Promise<void>;

  /**
   * Load all tasks in file order, each with its 1-based id.
   * A missing tasks file is created empty.
   */
  loadTasks(): Promise<StoredTask[]>;

  /** Replace the whole task collection. Ids are not persisted. */
  saveTasks(tasks: readonly Task[]): Promise<void>;

  /** Add one task record after the existing ones. */
  appendTask(task: Task): Promise<void>;

  /** Create any missing record file, seeding the admin account. Idempotent. */
  initStore(): Promise<StoreInitResult>;
}
