/**
 * CLI stats command - totals and averages for a period.
 */

import { Command } from 'commander';
import { getSessionStats } from '../../core/sessions/index.js';
import { describePeriod } from '../../core/reports/index.js';
import { WorklogError } from '../../core/errors.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderStats } from '../renderers/sessions.js';
import { getCliStore } from '../context.js';
import { parsePositiveInt } from '../parsers.js';

/**
 * Register the stats command.
 */
export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('Show session statistics')
    .option('--today', 'Only today')
    .option('-d, --days <n>', 'Only the last N days', parsePositiveInt)
    .action((opts: { today?: boolean; days?: number }) => {
      try {
        const stats = getSessionStats({ today: opts.today, days: opts.days }, getCliStore());
        const periodDescription = opts.today
          ? 'Today'
          : opts.days !== undefined
            ? describePeriod({ kind: 'days', days: opts.days })
            : 'All Time';

        cliOutput({ periodDescription, ...stats }, { operation: 'sessions.stats', render: renderStats });
      } catch (err) {
        if (err instanceof WorklogError) {
          cliError(err);
          process.exitCode = err.code;
          return;
        }
        throw err;
      }
    });
}
