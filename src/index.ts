/**
 * teamtask - team task tracker with flat-file storage and overview reports.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type {
  Task,
  StoredTask,
  UserTable,
  TaskStats,
  UserTaskStats,
  UserStats,
} from './types/task.js';
export type { TeamTaskConfig } from './types/config.js';

// Core
export { TeamTaskError } from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { loadConfig, getDefaultConfig } from './core/config.js';
export { resolvePaths, type ProjectPaths } from './core/paths.js';
export { parseCalendarDate, isCalendarDate, formatCalendarDate } from './core/dates.js';

// Storage
export type { RecordStore, StoreInitResult } from './store/record-store.js';
export { createTextRecordStore, type TextRecordStoreOptions } from './store/text-record-store.js';
export { parseRecords, serializeRecords, encodeRecord, splitRecord } from './store/records.js';

// Statistics and reports
export {
  isOverdue,
  computeTaskStats,
  computeUserStats,
  roundHalfEven,
} from './core/stats/index.js';
export {
  renderTaskOverview,
  renderUserOverview,
  writeReports,
  generateReports,
  readReports,
  type ReportWriteResult,
} from './core/reports/index.js';

// Tasks and users
export {
  addTask,
  listTasks,
  completeTask,
  updateTask,
  deleteTask,
} from './core/tasks/index.js';
export { registerUser, authenticate, isAdmin } from './core/users/index.js';
