/**
 * Configuration type definitions.
 * Covers project and global config with cascade resolution.
 */

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Record file locations. */
export interface StorageConfig {
  /** Directory holding the record files, relative to the project directory. */
  dataDir: string;
  usersFile: string;
  tasksFile: string;
}

/** Report file locations. */
export interface ReportsConfig {
  /** Directory the reports are written to, relative to the project directory. */
  dir: string;
  taskOverviewFile: string;
  userOverviewFile: string;
}

/** Administrator account settings. */
export interface AdminConfig {
  /** Username that unlocks the admin menu. */
  username: string;
  /** Password written when user.txt is seeded. */
  defaultPassword: string;
}

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to .teamtask/ (default: 'logs/teamtask.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** teamtask configuration (config.json). */
export interface TeamTaskConfig {
  storage: StorageConfig;
  reports: ReportsConfig;
  admin: AdminConfig;
  logging: LoggingConfig;
}
