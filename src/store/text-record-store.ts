/**
 * Text-file implementation of the RecordStore interface.
 *
 * Users live in one file as `username, password` lines and tasks in another
 * as six-field lines (see records.ts for the escaping rules). Every
 * operation reads or rewrites a whole file; writes go through atomicWrite.
 */

import type { StoredTask, Task, UserTable } from '../types/task.js';
import type { AdminConfig } from '../types/config.js';
import type { RecordStore, StoreInitResult } from './record-store.js';
import { atomicWrite, safeReadFile } from './atomic.js';
import { parseRecords, serializeRecords, type SkippedLine } from './records.js';
import { getLogger } from '../core/logger.js';

const USER_FIELDS = 2;
const TASK_FIELDS = 6;

/** Options for createTextRecordStore. */
export interface TextRecordStoreOptions {
  usersPath: string;
  tasksPath: string;
  /** Account written when the users file is seeded. */
  admin: Pick<AdminConfig, 'username' | 'defaultPassword'>;
  /** Receives every warning the store logs, for showing to the user. */
  onWarning?: (message: string) => void;
}

/** Map a task to its six stored fields, in file order. */
export function taskToFields(task: Task): string[] {
  return [
    task.username,
    task.title,
    task.description,
    task.assignedDate,
    task.dueDate,
    task.completed,
  ];
}

/** Build a stored task from six fields and its position. */
export function fieldsToTask(fields: readonly string[], id: number): StoredTask {
  const [username = '', title = '', description = '', assignedDate = '', dueDate = '', completed = ''] = fields;
  return { id, username, title, description, assignedDate, dueDate, completed };
}

/** Append one serialized record to existing content, repairing a missing final newline. */
function appendLine(existing: string | null, fields: readonly string[]): string {
  const base = existing ?? '';
  const separator = base !== '' && !base.endsWith('\n') ? '\n' : '';
  return base + separator + serializeRecords([fields]);
}

/**
 * Create a text file-backed RecordStore.
 */
export function createTextRecordStore(options: TextRecordStoreOptions): RecordStore {
  const { usersPath, tasksPath, admin, onWarning } = options;
  const log = getLogger('store');

  function warn(bindings: Record<string, unknown>, message: string): void {
    log.warn(bindings, message);
    onWarning?.(message);
  }

  function warnSkipped(file: string, skipped: SkippedLine[]): void {
    for (const line of skipped) {
      warn(
        { file, lineNumber: line.lineNumber, fieldCount: line.fieldCount },
        `Skipping invalid line: '${line.text}'`,
      );
    }
  }

  async function seedUsers(): Promise<void> {
    await atomicWrite(usersPath, serializeRecords([[admin.username, admin.defaultPassword]]));
  }

  const store: RecordStore = {
    async loadUsers(): Promise<UserTable> {
      const content = await safeReadFile(usersPath);
      if (content === null) {
        warn({ file: usersPath }, 'Users file not found. Creating new file with admin.');
        await seedUsers();
        return new Map([[admin.username, admin.defaultPassword]]);
      }

      const { records, skipped } = parseRecords(content, USER_FIELDS);
      warnSkipped(usersPath, skipped);

      const users: UserTable = new Map();
      for (const [username = '', password = ''] of records) {
        users.set(username, password);
      }
      return users;
    },

    async appendUser(username: string, password: string): Promise<void> {
      const content = await safeReadFile(usersPath);
      await atomicWrite(usersPath, appendLine(content, [username, password]));
    },

    async loadTasks(): Promise<StoredTask[]> {
      const content = await safeReadFile(tasksPath);
      if (content === null) {
        warn({ file: tasksPath }, 'Tasks file not found. Creating empty file.');
        await atomicWrite(tasksPath, '');
        return [];
      }

      const { records, skipped } = parseRecords(content, TASK_FIELDS);
      warnSkipped(tasksPath, skipped);
      return records.map((fields, index) => fieldsToTask(fields, index + 1));
    },

    async saveTasks(tasks: readonly Task[]): Promise<void> {
      await atomicWrite(tasksPath, serializeRecords(tasks.map(taskToFields)));
    },

    async appendTask(task: Task): Promise<void> {
      const content = await safeReadFile(tasksPath);
      await atomicWrite(tasksPath, appendLine(content, taskToFields(task)));
    },

    async initStore(): Promise<StoreInitResult> {
      const result: StoreInitResult = { usersSeeded: false, tasksCreated: false };

      if (await safeReadFile(usersPath) === null) {
        await seedUsers();
        result.usersSeeded = true;
      }
      if (await safeReadFile(tasksPath) === null) {
        await atomicWrite(tasksPath, '');
        result.tasksCreated = true;
      }

      if (result.usersSeeded || result.tasksCreated) {
        log.info({ usersPath, tasksPath, ...result }, 'Record store initialized');
      }
      return result;
    },
  };

  return store;
}
