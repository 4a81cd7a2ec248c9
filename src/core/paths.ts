/**
 * Path resolution for teamtask.
 *
 * Environment variables:
 *   TEAMTASK_HOME - Global configuration directory (default: ~/.teamtask)
 *
 * Record and report files live in the project directory (the working
 * directory unless --dir is given); settings and logs live in its
 * .teamtask/ subdirectory.
 */

import { resolve, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';
import type { TeamTaskConfig } from '../types/config.js';

/**
 * Get the global teamtask home directory.
 * Respects TEAMTASK_HOME env var, defaults to ~/.teamtask.
 */
export function getTeamTaskHome(): string {
  return process.env['TEAMTASK_HOME'] ?? join(homedir(), '.teamtask');
}

/** Get the global config file path. */
export function getGlobalConfigPath(): string {
  return join(getTeamTaskHome(), 'config.json');
}

/** Get the absolute project directory. */
export function getProjectDir(cwd?: string): string {
  return resolve(cwd ?? process.cwd());
}

/** Get the project's .teamtask directory (settings and logs). */
export function getTeamTaskDir(cwd?: string): string {
  return join(getProjectDir(cwd), '.teamtask');
}

/** Get the path to the project's config.json file. */
export function getConfigPath(cwd?: string): string {
  return join(getTeamTaskDir(cwd), 'config.json');
}

/**
 * Resolve a project-relative path to an absolute path.
 * Absolute paths pass through; a leading tilde expands to the home directory.
 */
export function resolveProjectPath(relativePath: string, cwd?: string): string {
  if (isAbsolute(relativePath)) {
    return relativePath;
  }
  if (relativePath.startsWith('~/') || relativePath === '~') {
    return resolve(homedir(), relativePath.slice(2));
  }
  return resolve(getProjectDir(cwd), relativePath);
}

/** Absolute locations of every file teamtask reads or writes. */
export interface ProjectPaths {
  projectDir: string;
  usersPath: string;
  tasksPath: string;
  taskOverviewPath: string;
  userOverviewPath: string;
}

/** Resolve all file locations from configuration. */
export function resolvePaths(config: TeamTaskConfig, cwd?: string): ProjectPaths {
  const dataDir = resolveProjectPath(config.storage.dataDir, cwd);
  const reportDir = resolveProjectPath(config.reports.dir, cwd);
  return {
    projectDir: getProjectDir(cwd),
    usersPath: join(dataDir, config.storage.usersFile),
    tasksPath: join(dataDir, config.storage.tasksFile),
    taskOverviewPath: join(reportDir, config.reports.taskOverviewFile),
    userOverviewPath: join(reportDir, config.reports.userOverviewFile),
  };
}
