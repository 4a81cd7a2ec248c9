#!/usr/bin/env node
/**
 * teamtask CLI entry point.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { registerSessionCommand } from './commands/session.js';
import { registerInitCommand } from './commands/init.js';
import { registerListCommand } from './commands/list.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerOverviewCommand, registerReportCommand } from './commands/report.js';
import { createCliContext, setCliContext, type GlobalOptions } from './context.js';
import { cliError } from './renderers/index.js';
import { TeamTaskError } from '../core/errors.js';
import { getTeamTaskDir } from '../core/paths.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

/** Read version from package.json (single source of truth). */
function getPackageVersion(): string {
  // dist/cli/index.js and src/cli/index.ts both sit two levels below the root
  const moduleRoot = join(dirname(fileURLToPath(import.meta.url)), '..', '..');
  try {
    const pkg: unknown = JSON.parse(readFileSync(join(moduleRoot, 'package.json'), 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    process.stderr.write(`Warning: could not read package version: ${String(err)}\n`);
  }
  return '0.0.0';
}

/** Commands that create the data files themselves. */
const SKIP_STORE_INIT = new Set(['init']);

const program = new Command();

program
  .name('teamtask')
  .description('Team task tracker with flat-file storage and overview reports')
  .version(getPackageVersion())
  .option('--dir <path>', 'Project directory holding the data files and .teamtask/')
  .option('--json', 'Output JSON envelopes instead of human-readable text');

registerSessionCommand(program);
registerInitCommand(program);
registerListCommand(program);
registerStatsCommand(program);
registerReportCommand(program);
registerOverviewCommand(program);

// Resolve config, start logging and make sure both data files exist before
// any command runs.
program.hook('preAction', async (_thisCommand, actionCommand) => {
  const opts = actionCommand.optsWithGlobals<GlobalOptions>();
  const ctx = await createCliContext(opts);
  setCliContext(ctx);
  initLogger(getTeamTaskDir(opts.dir), ctx.config.logging);
  getLogger('cli').debug({ command: actionCommand.name(), dir: ctx.paths.projectDir }, 'Command start');

  if (!SKIP_STORE_INIT.has(actionCommand.name())) {
    await ctx.store.initStore();
  }
});

program
  .parseAsync()
  .catch((err: unknown) => {
    if (err instanceof TeamTaskError) {
      cliError(err);
      process.exitCode = err.code;
      return;
    }
    getLogger('cli').fatal({ err }, 'Unexpected error');
    process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = ExitCode.GENERAL_ERROR;
  })
  .finally(closeLogger);
