/**
 * commander argument parsers.
 */

import { InvalidArgumentError } from 'commander';

/** Parse a positive whole number (limits, day counts, ids). */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive whole number.');
  }
  return parsed;
}
