/**
 * Task box rendering.
 *
 *   +-----------------------------+
 *   | Task              Write docs |
 *   | Assigned to       alice      |
 *   ...
 *   +-----------------------------+
 */

import type { Task } from '../../types/task.js';

const LABEL_WIDTH = 18;

/** A rendered box and its outer width. */
export interface TaskBox {
  lines: string[];
  width: number;
}

function row(label: string, value: string): string {
  return `${label.padEnd(LABEL_WIDTH)}${value}`;
}

/** Render one task as a bordered box. */
export function renderTaskBox(task: Task): TaskBox {
  const rows = [
    row('Task', task.title),
    row('Assigned to', task.username),
    row('Description', task.description),
    row('Assigned on', task.assignedDate),
    row('Due by', task.dueDate),
    row('Completed', task.completed),
  ];
  const maxLength = Math.max(...rows.map((r) => r.length));
  const width = maxLength + 4;
  const border = `+${'-'.repeat(width - 2)}+`;

  return {
    lines: [border, ...rows.map((r) => `| ${r.padEnd(maxLength)} |`), border],
    width,
  };
}

/**
 * Render a list of task boxes, each followed by a blank line.
 *
 * Numbered lists put `Task <n>:` above each box for selection prompts.
 * Plain lists end with a rule as wide as the widest box.
 */
export function renderTaskList(tasks: readonly Task[], options: { numbered?: boolean } = {}): string {
  const out: string[] = [];
  let widest = 0;

  tasks.forEach((task, index) => {
    if (options.numbered) out.push('', `Task ${index + 1}:`);
    const box = renderTaskBox(task);
    widest = Math.max(widest, box.width);
    out.push(...box.lines, '');
  });

  if (!options.numbered && tasks.length > 0) {
    out.push('-'.repeat(widest));
  }
  return out.join('\n');
}
