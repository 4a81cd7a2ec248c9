/**
 * Statistics engine: aggregate and per-user task metrics.
 *
 * Both computations are pure. They take the collections already loaded
 * from the record store and an optional reference moment for the
 * overdue check.
 */

import type { Task, TaskStats, UserStats, UserTaskStats } from '../../types/task.js';
import { isOverdue } from './overdue.js';

export { isOverdue } from './overdue.js';

/**
 * Round to a number of decimals, ties to even, on the exact value of the double.
 *
 * A double lies exactly halfway between two multiples of 10^-decimals only
 * when `value * 2^(decimals + 1)` is an odd integer; every other value is
 * rounded by `toFixed`, which works on the exact binary value. So
 * 3.125 -> 3.12, 0.375 -> 0.38, 1.005 -> 1 and 0.025 -> 0.03
 * (the double nearest 0.025 lies just above it).
 */
export function roundHalfEven(value: number, decimals: number = 2): number {
  const halves = value * 2 ** (decimals + 1);
  if (Number.isInteger(halves) && halves % 2 !== 0) {
    const factor = 10 ** decimals;
    const floor = Math.floor(value * factor);
    return (floor % 2 === 0 ? floor : floor + 1) / factor;
  }
  return Number(value.toFixed(decimals));
}

/** `part / whole * 100` rounded to 2 decimals, or 0 when `whole` is 0. */
export function percentOf(part: number, whole: number): number {
  if (whole === 0) return 0;
  return roundHalfEven((part / whole) * 100);
}

function isCompleted(task: Task): boolean {
  return task.completed === 'Yes';
}

/** Compute aggregate statistics over all tasks. */
export function computeTaskStats(tasks: readonly Task[], now: Date = new Date()): TaskStats {
  const total = tasks.length;
  const completed = tasks.filter(isCompleted).length;
  const uncompleted = total - completed;
  const overdueUncompleted = tasks.filter(
    (t) => t.completed === 'No' && isOverdue(t.dueDate, now),
  ).length;

  return {
    total,
    completed,
    uncompleted,
    overdueUncompleted,
    incompletePercent: percentOf(uncompleted, total),
    overduePercent: percentOf(overdueUncompleted, total),
  };
}

/**
 * Compute per-user statistics.
 *
 * Every registered user gets an entry, in user order, even without tasks.
 * A task counts as completed or else, if past due, as overdue; never both.
 * Tasks of unregistered usernames only count towards `totalTasks`.
 */
export function computeUserStats(
  tasks: readonly Task[],
  users: ReadonlyMap<string, string>,
  now: Date = new Date(),
): UserStats {
  const totalTasks = tasks.length;
  const counts = new Map<string, { tasks: number; completed: number; overdue: number }>();
  for (const username of users.keys()) {
    counts.set(username, { tasks: 0, completed: 0, overdue: 0 });
  }

  for (const task of tasks) {
    const bucket = counts.get(task.username);
    if (!bucket) continue;
    bucket.tasks += 1;
    if (isCompleted(task)) {
      bucket.completed += 1;
    } else if (isOverdue(task.dueDate, now)) {
      bucket.overdue += 1;
    }
  }

  const perUser = new Map<string, UserTaskStats>();
  for (const [username, c] of counts) {
    perUser.set(username, {
      ...c,
      percentTotal: percentOf(c.tasks, totalTasks),
      percentCompleted: percentOf(c.completed, c.tasks),
      percentIncomplete: percentOf(c.tasks - c.completed, c.tasks),
      percentOverdue: percentOf(c.overdue, c.tasks),
    });
  }

  return { totalUsers: users.size, totalTasks, users: perUser };
}
