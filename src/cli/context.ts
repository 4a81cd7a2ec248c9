/**
 * CLI invocation context.
 *
 * Singleton holding the resolved configuration, file locations, record store
 * and output format for the current CLI invocation. Set once in the
 * Commander.js preAction hook; read by commands and cliOutput().
 */

import type { TeamTaskConfig } from '../types/config.js';
import type { RecordStore } from '../store/record-store.js';
import { resolvePaths, type ProjectPaths } from '../core/paths.js';
import { loadConfig } from '../core/config.js';
import { createTextRecordStore } from '../store/text-record-store.js';
import { TeamTaskError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

export interface CliContext {
  config: TeamTaskConfig;
  paths: ProjectPaths;
  store: RecordStore;
  /** Emit JSON envelopes instead of human text. */
  json: boolean;
}

/** Global options shared by every command. */
export interface GlobalOptions {
  dir?: string;
  json?: boolean;
}

let current: CliContext | null = null;

/** Resolve configuration and build the record store for a project directory. */
export async function createCliContext(opts: GlobalOptions): Promise<CliContext> {
  const config = await loadConfig(opts.dir);
  const paths = resolvePaths(config, opts.dir);
  const store = createTextRecordStore({
    usersPath: paths.usersPath,
    tasksPath: paths.tasksPath,
    admin: config.admin,
    onWarning: (message) => console.error(`Warning: ${message}`),
  });
  return { config, paths, store, json: opts.json === true };
}

/** Set the context for this CLI invocation. */
export function setCliContext(ctx: CliContext | null): void {
  current = ctx;
}

/** Get the current context. Throws if the preAction hook has not run. */
export function getCliContext(): CliContext {
  if (!current) {
    throw new TeamTaskError(ExitCode.GENERAL_ERROR, 'CLI context not initialized');
  }
  return current;
}

/** Whether output should be JSON. False before the context is set. */
export function isJsonFormat(): boolean {
  return current?.json ?? false;
}
