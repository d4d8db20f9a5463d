/**
 * Central output dispatch for CLI commands.
 *
 * Commands call:
 *   cliOutput(data, { operation: 'sessions.start', render: renderStart })
 *
 * The resolved format picks between the JSON envelope (formatSuccess) and the
 * command's human renderer.
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import type { WorklogError } from '../../core/errors.js';
import { red, CROSS } from './colors.js';

/** Human renderer for one command's result. */
export type HumanRenderer<T> = (data: T, quiet: boolean) => string;

/** Options for cliOutput. */
export interface CliOutputOptions<T> {
  /** Operation name for the JSON envelope. */
  operation: string;
  /** Human renderer for this result. */
  render: HumanRenderer<T>;
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<T>(data: T, opts: CliOutputOptions<T>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = opts.render(data, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(formatSuccess(data, opts.operation));
}

/**
 * Output an error to stderr in the resolved format.
 */
export function cliError(err: WorklogError): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    console.error(red(`${CROSS} Error: ${err.message}`));
    if (err.fix && !ctx.quiet) {
      console.error(`  Fix: ${err.fix}`);
    }
    return;
  }

  console.error(formatError(err));
}
