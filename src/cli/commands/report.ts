/**
 * CLI report and overview commands.
 *
 * Both write task_overview.txt and user_overview.txt; overview also prints
 * them. Exits FILE_ERROR when either file could not be written.
 */

import { Command } from 'commander';
import { getCliContext } from '../context.js';
import { cliOutput, handleCommandError } from '../renderers/index.js';
import {
  allReportsWritten,
  describeReportOutcomes,
  renderReportContents,
} from '../renderers/system.js';
import { generateReports, readReports } from '../../core/reports/index.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Register the report command.
 */
export function registerReportCommand(program: Command): void {
  program
    .command('report')
    .description('Generate the task and user overview reports')
    .action(async () => {
      try {
        const { store, paths } = getCliContext();
        const { written } = await generateReports(store, paths);
        cliOutput(written, {
          operation: 'system.report',
          human: describeReportOutcomes(written).join('\n'),
        });
        if (!allReportsWritten(written)) {
          process.exitCode = ExitCode.FILE_ERROR;
        }
      } catch (err) {
        handleCommandError(err, 'system.report');
      }
    });
}

/**
 * Register the overview command.
 */
export function registerOverviewCommand(program: Command): void {
  program
    .command('overview')
    .description('Generate both reports, then display them')
    .action(async () => {
      try {
        const { store, paths } = getCliContext();
        const contents = await readReports(store, paths);
        cliOutput(contents, {
          operation: 'system.overview',
          human: [...describeReportOutcomes(contents.written), renderReportContents(contents)].join('\n'),
        });
        if (!allReportsWritten(contents.written)) {
          process.exitCode = ExitCode.FILE_ERROR;
        }
      } catch (err) {
        handleCommandError(err, 'system.overview');
      }
    });
}
