/**
 * CLI start command - begin a new work session.
 */

import { Command } from 'commander';
import { splitTagArgs, startSession } from '../../core/sessions/index.js';
import { WorklogError } from '../../core/errors.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderStart } from '../renderers/sessions.js';
import { getCliStore } from '../context.js';

interface StartOptions {
  tags?: string[];
}

/**
 * Register the start command.
 */
export function registerStartCommand(program: Command): void {
  program
    .command('start <description>')
    .description('Start a new work session')
    .option('-t, --tags <tag...>', 'Tags for this session (repeatable or comma-separated)')
    .action((description: string, opts: StartOptions) => {
      try {
        const session = startSession(description, splitTagArgs(opts.tags ?? []), getCliStore());
        cliOutput(session, { operation: 'sessions.start', render: renderStart });
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
