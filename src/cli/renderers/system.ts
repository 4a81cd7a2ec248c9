/**
 * Human renderers for statistics and report generation.
 */

import { basename } from 'node:path';
import type { TaskStats, UserStats } from '../../types/task.js';
import type { ReportContents, ReportWriteResult } from '../../core/reports/index.js';
import { renderTaskOverview, renderUserOverview } from '../../core/reports/index.js';

/** Both overview documents, as they would be written to disk. */
export function renderStats(taskStats: TaskStats, userStats: UserStats): string {
  return `${renderTaskOverview(taskStats)}\n${renderUserOverview(userStats)}`;
}

/** One notice line per report: failures first, then what was written. */
export function describeReportOutcomes(written: ReportWriteResult): string[] {
  const outcomes = [written.taskOverview, written.userOverview];
  const failed = outcomes.filter((o) => !o.ok);
  const ok = outcomes.filter((o) => o.ok);

  const lines = failed.map((o) => `Error: Could not write to ${basename(o.path)}`);
  if (failed.length === 0) {
    lines.push(`Reports generated: ${ok.map((o) => basename(o.path)).join(', ')}`);
  } else if (ok.length > 0) {
    lines.push(...ok.map((o) => `Report generated: ${basename(o.path)}`));
  }
  return lines;
}

/** Whether every report was written. */
export function allReportsWritten(written: ReportWriteResult): boolean {
  return written.taskOverview.ok && written.userOverview.ok;
}

/** Display both reports as read back from disk, under section headings. */
export function renderReportContents(contents: ReportContents): string {
  const section = (title: string, body: string | null, path: string): string[] => [
    '',
    `=== ${title} ===`,
    body ?? `Error: Could not read ${basename(path)}`,
  ];

  return [
    ...section('Task Overview', contents.taskOverview, contents.written.taskOverview.path),
    ...section('User Overview', contents.userOverview, contents.written.userOverview.path),
  ].join('\n');
}
