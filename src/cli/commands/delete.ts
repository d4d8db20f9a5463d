/**
 * CLI delete command.
 */

import { Command } from 'commander';
import readline from 'node:readline';
import { deleteSession, findSession } from '../../core/sessions/index.js';
import { WorklogError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { Session } from '../../types/session.js';
import { formatDateTime } from '../../core/format.js';
import { parseLocalIso } from '../../core/time.js';
import { cliError, cliOutput } from '../renderers/index.js';
import { renderDelete } from '../renderers/sessions.js';
import { getCliStore } from '../context.js';
import { parsePositiveInt } from '../parsers.js';

/**
 * Ask a question via readline. Prompts go to stderr so JSON on stdout
 * stays parseable.
 */
export async function question(
  promptText: string,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stderr,
): Promise<string> {
  const rl = readline.createInterface({ input, output });

  return new Promise((resolve) => {
    // End of input closes the interface without an answer; treat it as "no".
    rl.once('close', () => resolve(''));
    rl.question(promptText, (answer: string) => {
      resolve(answer);
      rl.close();
    });
  });
}

/** Whether an answer to a y/N prompt means yes. */
export function isAffirmative(answer: string): boolean {
  return ['y', 'yes'].includes(answer.trim().toLowerCase());
}

async function confirmDelete(session: Session): Promise<boolean> {
  if (!process.stdin.isTTY) {
    throw new WorklogError(
      ExitCode.INVALID_INPUT,
      'Confirmation required to delete a session',
      { fix: `Re-run with --yes: worklog delete ${session.id} --yes` },
    );
  }
  const when = formatDateTime(parseLocalIso(session.startTime));
  const answer = await question(`Delete session ${session.id} (${when}: ${session.description})? [y/N] `);
  return isAffirmative(answer);
}

/**
 * Register the delete command.
 */
export function registerDeleteCommand(program: Command): void {
  program
    .command('delete')
    .alias('rm')
    .argument('<id>', 'Session ID', parsePositiveInt)
    .description('Delete a session by ID')
    .option('-y, --yes', 'Skip the confirmation prompt')
    .action(async (id: number, opts: { yes?: boolean }) => {
      try {
        const store = getCliStore();
        const session = findSession(id, store);
        if (!session) {
          throw new WorklogError(ExitCode.NOT_FOUND, `Session ${id} not found`, {
            fix: "Run 'worklog list' to see session IDs",
          });
        }

        if (!opts.yes && !(await confirmDelete(session))) {
          process.stderr.write('Cancelled\n');
          return;
        }

        if (!deleteSession(id, store)) {
          throw new WorklogError(ExitCode.NOT_FOUND, `Session ${id} not found`);
        }
        cliOutput({ id, deleted: true }, { operation: 'sessions.delete', render: renderDelete });
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
