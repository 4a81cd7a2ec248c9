/**
 * Overdue predicate.
 */

import { parseCalendarDate } from '../dates.js';

/**
 * Whether a due date lies strictly before `now`.
 *
 * The due date counts from local midnight, so a task due today is overdue
 * once today has started. A due date that does not parse is never overdue.
 */
export function isOverdue(dueDate: string, now: Date = new Date()): boolean {
  const due = parseCalendarDate(dueDate);
  if (due === null) return false;
  return due.getTime() < now.getTime();
}
