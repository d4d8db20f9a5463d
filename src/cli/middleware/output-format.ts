/**
 * Shared CLI middleware for resolving output format from --human/--json/--quiet flags.
 */

import type { OutputFormat } from '../../types/config.js';
import type { FormatResolution } from '../format-context.js';
import { WorklogError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/**
 * Resolve output format from commander option values.
 *
 * Flags win over the configured default; passing both --json and --human
 * is rejected.
 *
 * @param opts - commander parsed options (with globals)
 * @param configDefault - output.defaultFormat from configuration
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configDefault?: OutputFormat,
): FormatResolution {
  const jsonFlag = opts['json'] === true;
  const humanFlag = opts['human'] === true;
  const quiet = opts['quiet'] === true;

  if (jsonFlag && humanFlag) {
    throw new WorklogError(
      ExitCode.INVALID_INPUT,
      'Cannot combine --json and --human',
      { fix: 'Pass only one output format flag' },
    );
  }

  if (jsonFlag) return { format: 'json', source: 'flag', quiet };
  if (humanFlag) return { format: 'human', source: 'flag', quiet };
  if (configDefault) return { format: configDefault, source: 'config', quiet };
  return { format: 'human', source: 'default', quiet };
}
