/**
 * Report writer: renders task and user statistics into the two overview
 * documents, writes them, and reads them back for display.
 */

import type { TaskStats, UserStats } from '../../types/task.js';
import type { RecordStore } from '../../store/record-store.js';
import type { ProjectPaths } from '../paths.js';
import { atomicWrite, safeReadFile } from '../../store/atomic.js';
import { computeTaskStats, computeUserStats } from '../stats/index.js';
import { getLogger } from '../logger.js';

/** Where the two reports are written. */
export type ReportTargets = Pick<ProjectPaths, 'taskOverviewPath' | 'userOverviewPath'>;

/** Outcome of writing one report file. */
export type ReportOutcome =
  | { ok: true; path: string }
  | { ok: false; path: string; error: string };

/** Outcome of writing both report files. */
export interface ReportWriteResult {
  taskOverview: ReportOutcome;
  userOverview: ReportOutcome;
}

/**
 * Format a percentage for a report line.
 *
 * A percentage whose denominator was zero prints as `0`. Any computed value
 * keeps at least one decimal: 50 -> `50.0`, 0 -> `0.0`, 33.33 -> `33.33`.
 */
export function formatPercent(value: number, denominator: number): string {
  if (denominator === 0) return '0';
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

/** Render the task overview document. */
export function renderTaskOverview(stats: TaskStats): string {
  const lines = [
    'Task Overview',
    `Total tasks: ${stats.total}`,
    `Completed tasks: ${stats.completed}`,
    `Uncompleted tasks: ${stats.uncompleted}`,
    `Overdue uncompleted tasks: ${stats.overdueUncompleted}`,
    `Incomplete percentage: ${formatPercent(stats.incompletePercent, stats.total)}%`,
    `Overdue percentage: ${formatPercent(stats.overduePercent, stats.total)}%`,
  ];
  return lines.map((line) => `${line}\n`).join('');
}

/** Render the user overview document, one block per registered user. */
export function renderUserOverview(stats: UserStats): string {
  const lines = [
    'User Overview',
    `Total users: ${stats.totalUsers}`,
    `Total tasks: ${stats.totalTasks}`,
  ];

  for (const [username, u] of stats.users) {
    lines.push(
      '',
      `User: ${username}`,
      `Tasks assigned: ${u.tasks}`,
      `Percentage of total tasks: ${formatPercent(u.percentTotal, stats.totalTasks)}%`,
      `Percentage completed: ${formatPercent(u.percentCompleted, u.tasks)}%`,
      `Percentage incomplete: ${formatPercent(u.percentIncomplete, u.tasks)}%`,
      `Percentage overdue: ${formatPercent(u.percentOverdue, u.tasks)}%`,
    );
  }

  return lines.map((line) => `${line}\n`).join('');
}

async function writeReport(path: string, content: string): Promise<ReportOutcome> {
  try {
    await atomicWrite(path, content);
    return { ok: true, path };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    getLogger('reports').error({ path, err }, `Could not write report: ${path}`);
    return { ok: false, path, error: message };
  }
}

/**
 * Write both reports.
 *
 * Each file is written atomically and independently: a failure on one is
 * logged and reported in the result, and the other is still attempted.
 */
export async function writeReports(
  taskStats: TaskStats,
  userStats: UserStats,
  targets: ReportTargets,
): Promise<ReportWriteResult> {
  const taskOverview = await writeReport(targets.taskOverviewPath, renderTaskOverview(taskStats));
  const userOverview = await writeReport(targets.userOverviewPath, renderUserOverview(userStats));
  return { taskOverview, userOverview };
}

/** Statistics and write outcomes of one report generation. */
export interface GeneratedReports {
  taskStats: TaskStats;
  userStats: UserStats;
  written: ReportWriteResult;
}

/**
 * Re-read users and tasks, compute both statistics and write the reports.
 */
export async function generateReports(
  store: RecordStore,
  targets: ReportTargets,
  now: Date = new Date(),
): Promise<GeneratedReports> {
  const tasks = await store.loadTasks();
  const users = await store.loadUsers();
  const taskStats = computeTaskStats(tasks, now);
  const userStats = computeUserStats(tasks, users, now);
  const written = await writeReports(taskStats, userStats, targets);

  getLogger('reports').info(
    {
      tasks: taskStats.total,
      users: userStats.totalUsers,
      taskOverview: written.taskOverview.ok,
      userOverview: written.userOverview.ok,
    },
    'Reports generated',
  );
  return { taskStats, userStats, written };
}

/** Report bodies as read back from disk; null where a file could not be read. */
export interface ReportContents {
  taskOverview: string | null;
  userOverview: string | null;
  written: ReportWriteResult;
}

async function readReport(path: string): Promise<string | null> {
  try {
    const content = await safeReadFile(path);
    if (content === null) {
      getLogger('reports').error({ path }, `Report not found: ${path}`);
    }
    return content;
  } catch (err) {
    getLogger('reports').error({ path, err }, `Could not read report: ${path}`);
    return null;
  }
}

/**
 * Regenerate both reports, then read them back for display.
 */
export async function readReports(
  store: RecordStore,
  targets: ReportTargets,
  now: Date = new Date(),
): Promise<ReportContents> {
  const { written } = await generateReports(store, targets, now);
  return {
    taskOverview: await readReport(targets.taskOverviewPath),
    userOverview: await readReport(targets.userOverviewPath),
    written,
  };
}
