/**
 * Tests for the interactive session, driven by a scripted prompter.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { runSession } from '../menu.js';
import { promptTaskNumber, parseInteger } from '../prompts.js';
import { InputClosedError, type Prompter, type SessionIO } from '../prompter.js';
import type { SessionDeps } from '../actions.js';
import { createTextRecordStore } from '../../../store/text-record-store.js';
import { getDefaultConfig } from '../../../core/config.js';
import { resolvePaths } from '../../../core/paths.js';
import { TeamTaskError } from '../../../core/errors.js';
import { ExitCode } from '../../../types/exit-codes.js';

/** Prompter that answers from a fixed script, then reports end of input. */
class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  closed = false;

  constructor(private readonly answers: string[]) {}

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new InputClosedError();
    return answer;
  }

  close(): void {
    this.closed = true;
  }
}

function scriptedIO(answers: string[]): SessionIO & { prompter: ScriptedPrompter; output: string[] } {
  const output: string[] = [];
  return {
    prompter: new ScriptedPrompter(answers),
    output,
    print: (text: string) => {
      output.push(text);
    },
  };
}

const USERS = 'admin, pw0\nalice, test-secret\nbob, pw2\n';
const TASKS = [
  'alice, Write docs, User guide, 2024-01-01, 2024-07-01, No',
  'bob, Fix bug, Crash on start, 2024-01-02, 2024-02-02, Yes',
  'alice, Review PR, Login form, 2024-01-03, 2024-02-03, Yes',
].join('\n');

const ALICE = ['alice', 'test-secret'];
const ADMIN = ['admin', 'pw0'];

describe('interactive session', () => {
  let tempDir: string;
  let deps: SessionDeps;
  const now = new Date(2024, 5, 15, 12, 0, 0);

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'teamtask-session-test-'));
    await writeFile(join(tempDir, 'user.txt'), USERS);
    await writeFile(join(tempDir, 'tasks.txt'), `${TASKS}\n`);
    const config = getDefaultConfig();
    const paths = resolvePaths(config, tempDir);
    deps = {
      config,
      paths,
      store: createTextRecordStore({
        usersPath: paths.usersPath,
        tasksPath: paths.tasksPath,
        admin: config.admin,
      }),
      now: () => now,
    };
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  async function tasksFile(): Promise<string> {
    return readFile(join(tempDir, 'tasks.txt'), 'utf8');
  }

  describe('login', () => {
    it('retries until the credentials match', async () => {
      const io = scriptedIO(['zed', 'x', 'alice', 'wrong', ...ALICE]);
      expect(await runSession(deps, io)).toBe('alice');
      expect(io.output.slice(0, 4)).toEqual([
        'Welcome to the Task Manager. Please log in.',
        "Username 'zed' does not exist. Try again.",
        'Incorrect password. Try again.',
        'Login successful. Welcome, alice.',
      ]);
      expect(io.prompter.questions.slice(0, 2)).toEqual(['Enter your username: ', 'Enter your password: ']);
    });

    it('trims credentials', async () => {
      const io = scriptedIO(['  alice ', ' test-secret ']);
      expect(await runSession(deps, io)).toBe('alice');
    });

    it('ends quietly when input closes before login', async () => {
      const io = scriptedIO(['alice']);
      expect(await runSession(deps, io)).toBeNull();
      expect(io.prompter.closed).toBe(true);
    });
  });

  describe('menu', () => {
    it('shows the user menu without administrator entries', async () => {
      const io = scriptedIO([...ALICE, 'e']);
      await runSession(deps, io);
      expect(io.output.slice(2)).toEqual([
        '\nPlease select one of the following options:',
        'a - add task',
        'va - view all tasks',
        'vm - view my tasks',
        'e - exit',
        '\nGoodbye, alice. See you next time.',
      ]);
    });

    it('shows the administrator menu in order', async () => {
      const io = scriptedIO([...ADMIN, 'e']);
      await runSession(deps, io);
      expect(io.output.slice(3, 12)).toEqual([
        'r - register user',
        'a - add task',
        'va - view all tasks',
        'vm - view my tasks',
        'vc - view completed tasks',
        'del - delete a task',
        'ds - display statistics',
        'gr - generate reports',
        'e - exit',
      ]);
    });

    it('treats administrator keys from other users as invalid', async () => {
      const io = scriptedIO([...ALICE, 'del', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('Invalid option. Please select a valid option.');
      expect(await tasksFile()).toBe(`${TASKS}\n`);
    });

    it('accepts options in any case', async () => {
      const io = scriptedIO([...ALICE, 'E']);
      await runSession(deps, io);
      expect(io.output[io.output.length - 1]).toBe('\nGoodbye, alice. See you next time.');
    });

    it('prints a failed action and shows the menu again', async () => {
      const io = scriptedIO([...ALICE, 'va', 'e']);
      const failing: SessionDeps = {
        ...deps,
        store: {
          ...deps.store,
          loadTasks: async () => {
            throw new TeamTaskError(ExitCode.FILE_ERROR, 'Failed to read: tasks.txt');
          },
        },
      };
      expect(await runSession(failing, io)).toBe('alice');
      expect(io.output).toContain('Failed to read: tasks.txt');
      expect(io.output[io.output.length - 1]).toBe('\nGoodbye, alice. See you next time.');
    });

    it('ends the session when input closes at the menu', async () => {
      const io = scriptedIO([...ALICE]);
      expect(await runSession(deps, io)).toBe('alice');
      expect(io.prompter.closed).toBe(true);
    });
  });

  describe('register user', () => {
    it('re-asks on an existing name or mismatched passwords', async () => {
      const io = scriptedIO([
        ...ADMIN, 'r',
        'alice',
        'carol', 'pw', 'px',
        'carol', 'test-secret', 'test-secret',
        'e',
      ]);
      await runSession(deps, io);

      expect(io.output).toContain("Username 'alice' already exists. Try another.");
      expect(io.output).toContain('Passwords do not match. Try again.');
      expect(io.output).toContain("User 'carol' registered successfully.");
      expect(await readFile(join(tempDir, 'user.txt'), 'utf8')).toBe(`${USERS}carol, test-secret\n`);
    });

    it('cancels on a blank username', async () => {
      const io = scriptedIO([...ADMIN, 'r', '', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('Registration cancelled.');
    });
  });

  describe('add task', () => {
    it('adds a task assigned today', async () => {
      const io = scriptedIO([...ALICE, 'a', 'bob', 'Plan, sprint', 'Next two weeks', '2024-07-01', 'e']);
      await runSession(deps, io);

      expect(io.output).toContain("Task 'Plan, sprint' added for bob.");
      const tasks = await deps.store.loadTasks();
      expect(tasks[3]).toEqual({
        id: 4,
        username: 'bob',
        title: 'Plan, sprint',
        description: 'Next two weeks',
        assignedDate: '2024-06-15',
        dueDate: '2024-07-01',
        completed: 'No',
      });
    });

    it('returns to the menu for an unknown assignee', async () => {
      const io = scriptedIO([...ALICE, 'a', 'zed', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain("User 'zed' does not exist. Try again.");
      expect(await tasksFile()).toBe(`${TASKS}\n`);
    });

    it('returns to the menu for an invalid due date', async () => {
      const io = scriptedIO([...ALICE, 'a', 'bob', 'T', 'D', '07/01/2024', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('Invalid date format. Use YYYY-MM-DD. Try again.');
      expect(await tasksFile()).toBe(`${TASKS}\n`);
    });
  });

  describe('view tasks', () => {
    it('shows all tasks', async () => {
      const io = scriptedIO([...ALICE, 'va', 'e']);
      await runSession(deps, io);
      const index = io.output.indexOf('\nAll Tasks');
      expect(index).toBeGreaterThan(0);
      expect(io.output[index + 1]).toContain('| Task              Write docs |');
    });

    it('shows completed tasks to the administrator', async () => {
      const io = scriptedIO([...ADMIN, 'vc', 'e']);
      await runSession(deps, io);
      const index = io.output.indexOf('\nCompleted Tasks');
      const list = io.output[index + 1] ?? '';
      expect(list).toContain('Fix bug');
      expect(list).toContain('Review PR');
      expect(list).not.toContain('Write docs');
    });

    it('reports an empty task list', async () => {
      await writeFile(join(tempDir, 'tasks.txt'), '');
      const io = scriptedIO([...ADMIN, 'va', 'vc', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('No tasks to display.');
      expect(io.output).toContain('No completed tasks to display.');
    });
  });

  describe('view my tasks', () => {
    it('marks a selected task complete', async () => {
      const io = scriptedIO([...ALICE, 'vm', '1', 'c', 'e']);
      await runSession(deps, io);

      expect(io.output).toContain('\nMy Tasks (alice)');
      expect(io.output).toContain("Task 'Write docs' marked complete.");
      expect((await deps.store.loadTasks())[0]?.completed).toBe('Yes');
    });

    it('re-asks for a task number until it is valid', async () => {
      const io = scriptedIO([...ALICE, 'vm', 'abc', '7', '0', '-1', 'e']);
      await runSession(deps, io);

      expect(io.output.filter((l) => l === 'Please enter a valid number.')).toHaveLength(1);
      expect(io.output.filter((l) => l === 'Invalid task number. Try again.')).toHaveLength(2);
      expect(await tasksFile()).toBe(`${TASKS}\n`);
    });

    it('edits the assignee and due date', async () => {
      const io = scriptedIO([...ALICE, 'vm', '1', 'e', '3', 'bob', '2024-09-01', 'e']);
      await runSession(deps, io);

      expect(io.output).toContain("Task 'Write docs' updated.");
      const [task] = await deps.store.loadTasks();
      expect(task?.username).toBe('bob');
      expect(task?.dueDate).toBe('2024-09-01');
    });

    it('edits only the due date', async () => {
      const io = scriptedIO([...ALICE, 'vm', '1', 'e', '2', '2024-08-01', 'e']);
      await runSession(deps, io);
      const [task] = await deps.store.loadTasks();
      expect(task?.username).toBe('alice');
      expect(task?.dueDate).toBe('2024-08-01');
    });

    it('refuses to edit a completed task', async () => {
      const io = scriptedIO([...ALICE, 'vm', '2', 'e', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('Cannot edit completed task.');
    });

    it('rejects an unknown new assignee', async () => {
      const io = scriptedIO([...ALICE, 'vm', '1', 'e', '1', 'zed', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain("User 'zed' does not exist.");
      expect(await tasksFile()).toBe(`${TASKS}\n`);
    });

    it('rejects an invalid new due date', async () => {
      const io = scriptedIO([...ALICE, 'vm', '1', 'e', '2', 'soon', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('Invalid date format. Use YYYY-MM-DD.');
    });

    it('rejects unknown edit options and actions', async () => {
      const io = scriptedIO([...ALICE, 'vm', '1', 'e', '9', 'vm', '1', 'x', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('Invalid edit option.');
      expect(io.output).toContain("Invalid action. Choose 'c' or 'e'.");
    });

    it('reports a user without tasks', async () => {
      const io = scriptedIO([...ADMIN, 'vm', 'e']);
      await runSession(deps, io);
      expect(io.output).toContain('No tasks assigned to you, admin.');
    });
  });

  describe('delete task', () => {
    it('deletes the selected task', async () => {
      const io = scriptedIO([...ADMIN, 'del', '2', 'e']);
      await runSession(deps, io);

      expect(io.output).toContain("Task 'Fix bug' deleted successfully.");
      expect((await deps.store.loadTasks()).map((t) => t.title)).toEqual(['Write docs', 'Review PR']);
    });

    it('cancels on 0 and rejects bad numbers', async () => {
      const io = scriptedIO([...ADMIN, 'del', '0', 'del', 'two', 'del', '9', 'e']);
      await runSession(deps, io);

      expect(io.output).toContain('Deletion cancelled.');
      expect(io.output).toContain('Please enter a valid number.');
      expect(io.output).toContain('Invalid task number. Try again.');
      expect(await tasksFile()).toBe(`${TASKS}\n`);
    });
  });

  describe('reports', () => {
    it('generates both report files', async () => {
      const io = scriptedIO([...ADMIN, 'gr', 'e']);
      await runSession(deps, io);

      expect(io.output).toContain('Reports generated: task_overview.txt, user_overview.txt');
      expect(await readFile(join(tempDir, 'task_overview.txt'), 'utf8')).toBe(
        [
          'Task Overview',
          'Total tasks: 3',
          'Completed tasks: 2',
          'Uncompleted tasks: 1',
          'Overdue uncompleted tasks: 0',
          'Incomplete percentage: 33.33%',
          'Overdue percentage: 0.0%',
          '',
        ].join('\n'),
      );
    });

    it('displays the regenerated reports', async () => {
      const io = scriptedIO([...ADMIN, 'ds', 'e']);
      await runSession(deps, io);

      const shown = io.output.find((l) => l.startsWith('\n=== Task Overview ===\n'));
      expect(shown).toBeDefined();
      expect(shown).toContain('\n=== User Overview ===\nUser Overview\nTotal users: 3\nTotal tasks: 3\n');
    });
  });
});

describe('parseInteger', () => {
  it('parses signed whole numbers', () => {
    expect(parseInteger(' 12 ')).toBe(12);
    expect(parseInteger('-1')).toBe(-1);
    expect(parseInteger('+3')).toBe(3);
  });

  it('rejects anything else', () => {
    expect(parseInteger('1.5')).toBeNull();
    expect(parseInteger('')).toBeNull();
    expect(parseInteger('one')).toBeNull();
  });
});

describe('promptTaskNumber', () => {
  it('returns the first valid choice', async () => {
    const io = scriptedIO(['3', '2']);
    expect(await promptTaskNumber(io, 2)).toBe(2);
    expect(io.output).toEqual(['Invalid task number. Try again.']);
  });

  it('returns -1 on the exit sentinel', async () => {
    const io = scriptedIO(['-1']);
    expect(await promptTaskNumber(io, 5)).toBe(-1);
  });

  it('handles long runs of bad input without recursion', async () => {
    const io = scriptedIO([...Array.from({ length: 5000 }, () => 'x'), '1']);
    expect(await promptTaskNumber(io, 1)).toBe(1);
    expect(io.output).toHaveLength(5000);
  });
});
