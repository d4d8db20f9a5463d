import { describe, it, expect } from 'vitest';
import {
  addDays,
  endOfDay,
  minutesBetween,
  parseDateString,
  parseLocalIso,
  startOfDay,
  toDateKey,
  toLocalIso,
} from '../time.js';
import { WorklogError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';

describe('toLocalIso', () => {
  it('formats local wall-clock time without an offset', () => {
    expect(toLocalIso(new Date(2026, 0, 5, 7, 8, 9, 10))).toBe('2026-01-05T07:08:09.010');
  });

  it('round-trips through parseLocalIso', () => {
    const date = new Date(2026, 9, 19, 23, 59, 58, 999);
    expect(parseLocalIso(toLocalIso(date)).getTime()).toBe(date.getTime());
  });

  it('sorts lexicographically in time order', () => {
    const earlier = toLocalIso(new Date(2026, 8, 30, 23, 0, 0));
    const later = toLocalIso(new Date(2026, 9, 1, 1, 0, 0));
    expect(earlier < later).toBe(true);
  });
});

describe('parseLocalIso', () => {
  it('rejects garbage', () => {
    expect(() => parseLocalIso('not-a-date')).toThrow('Invalid stored timestamp: not-a-date');
  });
});

describe('day helpers', () => {
  it('finds the start and end of a local day', () => {
    const noon = new Date(2026, 9, 19, 12, 0, 0);
    expect(startOfDay(noon)).toEqual(new Date(2026, 9, 19, 0, 0, 0));
    expect(endOfDay(noon)).toEqual(new Date(2026, 9, 19, 23, 59, 59, 999));
  });

  it('adds calendar days across month ends', () => {
    expect(addDays(new Date(2026, 9, 30, 8, 0, 0), 3)).toEqual(new Date(2026, 10, 2, 8, 0, 0));
  });

  it('keys dates by local calendar day', () => {
    expect(toDateKey(new Date(2026, 1, 3, 23, 59))).toBe('2026-02-03');
  });
});

describe('minutesBetween', () => {
  it('floors partial minutes', () => {
    expect(minutesBetween(new Date(2026, 9, 19, 10, 0, 0), new Date(2026, 9, 19, 10, 42, 30))).toBe(42);
  });

  it('never goes negative', () => {
    expect(minutesBetween(new Date(2026, 9, 19, 10, 0, 0), new Date(2026, 9, 19, 9, 0, 0))).toBe(0);
  });
});

describe('parseDateString', () => {
  const now = new Date(2026, 9, 19, 15, 30, 0);

  it('parses YYYY-MM-DD as local midnight', () => {
    expect(parseDateString('2026-10-01', now)).toEqual(new Date(2026, 9, 1));
  });

  it('understands today and yesterday', () => {
    expect(parseDateString('today', now)).toEqual(new Date(2026, 9, 19));
    expect(parseDateString(' Yesterday ', now)).toEqual(new Date(2026, 9, 18));
  });

  it('rejects impossible and unknown dates', () => {
    for (const input of ['2026-02-30', '10/19/2026', 'next week']) {
      try {
        parseDateString(input, now);
        expect.unreachable(`expected ${input} to be rejected`);
      } catch (err) {
        expect(err).toBeInstanceOf(WorklogError);
        expect(err instanceof WorklogError && err.code).toBe(ExitCode.INVALID_INPUT);
      }
    }
  });
});
