/**
 * CLI list command - past sessions, newest first.
 */

import { Command } from 'commander';
import { listSessions } from '../../core/sessions/index.js';
import { WorklogError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderList } from '../renderers/sessions.js';
import { getCliConfig, getCliStore } from '../context.js';
import { parsePositiveInt } from '../parsers.js';

interface ListOptions {
  today?: boolean;
  days?: number;
  tag?: string;
  limit?: number;
}

/**
 * Register the list command.
 */
export function registerListCommand(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List past work sessions')
    .option('--today', "Show only today's sessions")
    .option('-d, --days <n>', 'Show sessions from the last N days', parsePositiveInt)
    .option('-t, --tag <tag>', 'Filter by tag')
    .option('-l, --limit <n>', 'Maximum number of sessions to show', parsePositiveInt)
    .action((opts: ListOptions) => {
      try {
        const limit = opts.limit ?? getCliConfig().list.defaultLimit;
        const sessions = listSessions({
          today: opts.today,
          days: opts.days,
          tag: opts.tag,
          limit,
        }, getCliStore());

        cliOutput(
          { sessions, count: sessions.length, limit },
          { operation: 'sessions.list', render: renderList },
        );
        if (sessions.length === 0) {
          process.exitCode = ExitCode.NO_DATA;
        }
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
