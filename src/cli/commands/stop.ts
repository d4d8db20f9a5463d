/**
 * CLI stop command - end the active session.
 */

import { Command } from 'commander';
import { stopSession } from '../../core/sessions/index.js';
import { WorklogError } from '../../core/errors.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderStop } from '../renderers/sessions.js';
import { getCliStore } from '../context.js';

/**
 * Register the stop command.
 */
export function registerStopCommand(program: Command): void {
  program
    .command('stop')
    .description('Stop the current work session')
    .option('-n, --notes <text>', 'Notes about what you accomplished')
    .action((opts: { notes?: string }) => {
      try {
        const session = stopSession(opts.notes, getCliStore());
        cliOutput(session, { operation: 'sessions.stop', render: renderStop });
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
