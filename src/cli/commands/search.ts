/**
 * CLI search command - match descriptions and notes.
 */

import { Command } from 'commander';
import { searchSessions } from '../../core/sessions/index.js';
import { WorklogError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderSearch } from '../renderers/sessions.js';
import { getCliConfig, getCliStore } from '../context.js';
import { parsePositiveInt } from '../parsers.js';

/**
 * Register the search command.
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search <term>')
    .alias('find')
    .description('Search sessions by description or notes')
    .option('-l, --limit <n>', 'Maximum results', parsePositiveInt)
    .action((term: string, opts: { limit?: number }) => {
      try {
        const limit = opts.limit ?? getCliConfig().search.defaultLimit;
        const sessions = searchSessions(term, limit, getCliStore());

        cliOutput(
          { term, sessions, count: sessions.length },
          { operation: 'sessions.search', render: renderSearch },
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
