/**
 * Menu actions of the interactive session.
 *
 * Each action reads its own input, prints its own result and returns to the
 * menu. Domain errors raised by core operations propagate to the menu loop,
 * which prints them.
 */

import type { RecordStore } from '../../store/record-store.js';
import type { TeamTaskConfig } from '../../types/config.js';
import type { ProjectPaths } from '../../core/paths.js';
import { registerUser } from '../../core/users/index.js';
import {
  addTask,
  completeTask,
  deleteTask,
  listTasks,
  updateTask,
} from '../../core/tasks/index.js';
import { isCalendarDate } from '../../core/dates.js';
import { generateReports, readReports } from '../../core/reports/index.js';
import { renderTaskList } from '../renderers/tasks.js';
import { describeReportOutcomes, renderReportContents } from '../renderers/system.js';
import { BACK_TO_MENU, parseInteger, promptTaskNumber } from './prompts.js';
import type { SessionIO } from './prompter.js';

/** Everything an action needs besides the logged-in user. */
export interface SessionDeps {
  store: RecordStore;
  config: TeamTaskConfig;
  paths: ProjectPaths;
  /** Clock for assigned dates and overdue checks. */
  now?: () => Date;
}

/** State of one logged-in session. */
export interface SessionContext extends SessionDeps {
  io: SessionIO;
  user: string;
}

function clock(ctx: SessionContext): Date {
  return ctx.now ? ctx.now() : new Date();
}

/** r: register a new user. Re-asks until done or cancelled with a blank name. */
export async function registerAction(ctx: SessionContext): Promise<void> {
  const { io, store } = ctx;
  for (;;) {
    const username = (await io.prompter.ask('Enter new username (blank to cancel): ')).trim();
    if (username === '') {
      io.print('Registration cancelled.');
      return;
    }
    if ((await store.loadUsers()).has(username)) {
      io.print(`Username '${username}' already exists. Try another.`);
      continue;
    }

    const password = (await io.prompter.ask('Enter new password: ')).trim();
    const confirm = (await io.prompter.ask('Confirm password: ')).trim();
    if (password !== confirm) {
      io.print('Passwords do not match. Try again.');
      continue;
    }

    await registerUser(username, password, store);
    io.print(`User '${username}' registered successfully.`);
    return;
  }
}

/** a: add a task for any registered user. */
export async function addTaskAction(ctx: SessionContext): Promise<void> {
  const { io, store } = ctx;
  const username = (await io.prompter.ask('Enter username to assign task: ')).trim();
  if (!(await store.loadUsers()).has(username)) {
    io.print(`User '${username}' does not exist. Try again.`);
    return;
  }

  const title = (await io.prompter.ask('Enter task title: ')).trim();
  const description = (await io.prompter.ask('Enter task description: ')).trim();
  const dueDate = (await io.prompter.ask('Enter due date (YYYY-MM-DD): ')).trim();
  if (!isCalendarDate(dueDate)) {
    io.print('Invalid date format. Use YYYY-MM-DD. Try again.');
    return;
  }

  await addTask({ username, title, description, dueDate }, store, clock(ctx));
  io.print(`Task '${title}' added for ${username}.`);
}

/** va: show every task. */
export async function viewAllAction(ctx: SessionContext): Promise<void> {
  const tasks = await listTasks({}, ctx.store);
  if (tasks.length === 0) {
    ctx.io.print('No tasks to display.');
    return;
  }
  ctx.io.print('\nAll Tasks');
  ctx.io.print(renderTaskList(tasks));
}

/** vc: show completed tasks. */
export async function viewCompletedAction(ctx: SessionContext): Promise<void> {
  const tasks = await listTasks({ completed: true }, ctx.store);
  if (tasks.length === 0) {
    ctx.io.print('No completed tasks to display.');
    return;
  }
  ctx.io.print('\nCompleted Tasks');
  ctx.io.print(renderTaskList(tasks));
}

async function editTask(ctx: SessionContext, taskId: number): Promise<void> {
  const { io, store, user } = ctx;

  io.print('\nSelect edit option:');
  io.print('1 - edit username');
  io.print('2 - edit due date');
  io.print('3 - edit both');
  const option = (await io.prompter.ask(': ')).trim();
  if (option !== '1' && option !== '2' && option !== '3') {
    io.print('Invalid edit option.');
    return;
  }

  let username: string | undefined;
  let dueDate: string | undefined;

  if (option === '1' || option === '3') {
    username = (await io.prompter.ask('Enter new username: ')).trim();
    if (!(await store.loadUsers()).has(username)) {
      io.print(`User '${username}' does not exist.`);
      return;
    }
  }
  if (option === '2' || option === '3') {
    dueDate = (await io.prompter.ask('Enter new due date (YYYY-MM-DD): ')).trim();
    if (!isCalendarDate(dueDate)) {
      io.print('Invalid date format. Use YYYY-MM-DD.');
      return;
    }
  }

  const task = await updateTask({ taskId, owner: user, username, dueDate }, store);
  io.print(`Task '${task.title}' updated.`);
}

/** vm: show the user's own tasks, then complete or edit one of them. */
export async function viewMineAction(ctx: SessionContext): Promise<void> {
  const { io, store, user } = ctx;
  const mine = await listTasks({ username: user }, store);
  if (mine.length === 0) {
    io.print(`No tasks assigned to you, ${user}.`);
    return;
  }

  io.print(`\nMy Tasks (${user})`);
  io.print(renderTaskList(mine, { numbered: true }));

  const choice = await promptTaskNumber(io, mine.length);
  if (choice === BACK_TO_MENU) return;
  const selected = mine[choice - 1];
  if (!selected) return;

  io.print('\nSelect an action:');
  io.print('c - mark as complete');
  io.print('e - edit task');
  const action = (await io.prompter.ask(': ')).toLowerCase();

  if (action === 'c') {
    const task = await completeTask({ taskId: selected.id, owner: user }, store);
    io.print(`Task '${task.title}' marked complete.`);
  } else if (action === 'e') {
    if (selected.completed === 'Yes') {
      io.print('Cannot edit completed task.');
      return;
    }
    await editTask(ctx, selected.id);
  } else {
    io.print("Invalid action. Choose 'c' or 'e'.");
  }
}

/** del: delete any task by its number. */
export async function deleteAction(ctx: SessionContext): Promise<void> {
  const { io, store } = ctx;
  const tasks = await listTasks({}, store);
  if (tasks.length === 0) {
    io.print('No tasks to delete.');
    return;
  }

  io.print('\nSelect a task to delete:');
  io.print(renderTaskList(tasks, { numbered: true }));

  const choice = parseInteger(await io.prompter.ask('Enter task number to delete (0 to cancel): '));
  if (choice === null) {
    io.print('Please enter a valid number.');
    return;
  }
  if (choice === 0) {
    io.print('Deletion cancelled.');
    return;
  }
  const selected = tasks[choice - 1];
  if (choice < 1 || !selected) {
    io.print('Invalid task number. Try again.');
    return;
  }

  const deleted = await deleteTask({ taskId: selected.id }, store);
  io.print(`Task '${deleted.title}' deleted successfully.`);
}

/** gr: write both reports. */
export async function generateReportsAction(ctx: SessionContext): Promise<void> {
  const { written } = await generateReports(ctx.store, ctx.paths, clock(ctx));
  for (const line of describeReportOutcomes(written)) {
    ctx.io.print(line);
  }
}

/** ds: regenerate both reports and print them. */
export async function displayStatisticsAction(ctx: SessionContext): Promise<void> {
  const contents = await readReports(ctx.store, ctx.paths, clock(ctx));
  for (const line of describeReportOutcomes(contents.written)) {
    ctx.io.print(line);
  }
  ctx.io.print(renderReportContents(contents));
}
