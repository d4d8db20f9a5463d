/**
 * CLI status command - show the active session and its elapsed time.
 */

import { Command } from 'commander';
import { getSessionStatusView } from '../../core/sessions/index.js';
import { cliOutput } from '../renderers/index.js';
import { renderStatus } from '../renderers/sessions.js';
import { getCliStore } from '../context.js';

/**
 * Register the status command.
 */
export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show current session status')
    .action(() => {
      const view = getSessionStatusView(new Date(), getCliStore());
      cliOutput(view, { operation: 'sessions.status', render: renderStatus });
    });
}
