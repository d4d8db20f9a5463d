/**
 * Local wall-clock timestamp helpers.
 *
 * Sessions are stored as local ISO-8601 strings without an offset
 * (YYYY-MM-DDTHH:mm:ss.SSS). Fixed-width local strings sort the same way the
 * instants they denote do, so range filters compare them as text.
 */

import { WorklogError } from './errors.js';
import { ExitCode } from '../types/exit-codes.js';

const MS_PER_MINUTE = 60_000;

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/** Format a date as a local ISO timestamp without offset. */
export function toLocalIso(date: Date): string {
  return `${toDateKey(date)}T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/** Format a date as its local calendar day, YYYY-MM-DD. */
export function toDateKey(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Parse a stored local ISO timestamp.
 * Date-time strings without an offset are read as local time.
 */
export function parseLocalIso(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid stored timestamp: ${value}`);
  }
  return date;
}

/** Local midnight at the start of the given day. */
export function startOfDay(date: Date): Date {
  return new Date(date.getFullYear(), date.getMonth(), date.getDate());
}

/** Last millisecond of the given local day (next midnight is exclusive). */
export function endOfDay(date: Date): Date {
  return new Date(addDays(startOfDay(date), 1).getTime() - 1);
}

/** Add calendar days, keeping the local wall-clock time. */
export function addDays(date: Date, days: number): Date {
  const result = new Date(date.getTime());
  result.setDate(result.getDate() + days);
  return result;
}

/** Whole minutes between two instants, floored and never negative. */
export function minutesBetween(start: Date, end: Date): number {
  return Math.max(0, Math.floor((end.getTime() - start.getTime()) / MS_PER_MINUTE));
}

/**
 * Parse a user-supplied date: YYYY-MM-DD, 'today' or 'yesterday'.
 * Returns local midnight of that day.
 */
export function parseDateString(input: string, now: Date = new Date()): Date {
  const value = input.trim().toLowerCase();

  if (value === 'today') return startOfDay(now);
  if (value === 'yesterday') return startOfDay(addDays(now, -1));

  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (match) {
    const year = Number(match[1]);
    const month = Number(match[2]);
    const day = Number(match[3]);
    const date = new Date(year, month - 1, day);
    if (date.getFullYear() === year && date.getMonth() === month - 1 && date.getDate() === day) {
      return date;
    }
  }

  throw new WorklogError(
    ExitCode.INVALID_INPUT,
    `Invalid date: ${input}`,
    { fix: "Use YYYY-MM-DD, 'today', or 'yesterday'" },
  );
}
