/**
 * Period resolution for session listings.
 */

import type { DateRange, ListSessionsOptions } from '../../types/session.js';
import { addDays, startOfDay } from '../time.js';
import { WorklogError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

/** Reject a day count that is not a positive integer. */
export function assertValidDays(days: number | undefined): void {
  if (days !== undefined && (!Number.isInteger(days) || days <= 0)) {
    throw new WorklogError(
      ExitCode.INVALID_INPUT,
      `Invalid day count: ${days}`,
      { fix: 'Pass a positive whole number of days' },
    );
  }
}

/**
 * Resolve today/days into a concrete range ending now.
 * `today` wins when both are given; neither means unbounded.
 */
export function resolveListRange(
  options: Pick<ListSessionsOptions, 'days' | 'today'>,
  now: Date = new Date(),
): DateRange {
  assertValidDays(options.days);

  if (options.today) {
    return { start: startOfDay(now), end: now };
  }
  if (options.days !== undefined) {
    return { start: addDays(now, -options.days), end: now };
  }
  return {};
}
