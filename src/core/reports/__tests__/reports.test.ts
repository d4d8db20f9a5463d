/**
 * Tests for summary and day reports.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { openDatabase, MEMORY_DB, type DatabaseHandle } from '../../../store/sqlite.js';
import { createSessionStore, type SessionStore } from '../../../store/session-store.js';
import { startSession, stopSession } from '../../sessions/index.js';
import { endOfDay } from '../../time.js';
import { buildDayReport, buildSummaryReport, describePeriod } from '../index.js';

let handle: DatabaseHandle;
let store: SessionStore;

const NOW = new Date(2026, 9, 19, 12, 0, 0);

function worked(start: Date, end: Date, description: string, tags: string[] = [], notes?: string): number {
  vi.setSystemTime(start);
  const session = startSession(description, tags, store);
  vi.setSystemTime(end);
  stopSession(notes, store);
  return session.id;
}

describe('reports', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['Date'] });
    handle = openDatabase(MEMORY_DB);
    store = createSessionStore(handle.db, MEMORY_DB);
  });

  afterEach(() => {
    handle.native.close();
    vi.useRealTimers();
  });

  describe('buildSummaryReport', () => {
    let s1: number;
    let s2: number;
    let s3: number;

    beforeEach(() => {
      worked(new Date(2026, 9, 10, 9, 0, 0), new Date(2026, 9, 10, 10, 0, 0), 'Old work', ['api']);
      s1 = worked(new Date(2026, 9, 15, 9, 0, 0), new Date(2026, 9, 15, 10, 30, 0), 'Build endpoint', ['api', 'backend']);
      s2 = worked(new Date(2026, 9, 17, 14, 0, 0), new Date(2026, 9, 17, 14, 30, 0), 'Write guide', ['docs']);
      s3 = worked(new Date(2026, 9, 19, 9, 0, 0), new Date(2026, 9, 19, 10, 0, 0), 'Fix endpoint', ['api']);
      vi.setSystemTime(new Date(2026, 9, 19, 11, 0, 0));
      startSession('Still going', ['api'], store);
      vi.setSystemTime(NOW);
    });

    it('totals completed sessions of the last N days', () => {
      const report = buildSummaryReport({ period: { kind: 'days', days: 7 } }, store, NOW);

      expect(report.periodDescription).toBe('Last 7 Days');
      expect(report.period).toEqual({
        start: '2026-10-12T12:00:00.000',
        end: '2026-10-19T12:00:00.000',
      });
      expect(report.sessionCount).toBe(3);
      expect(report.totalMinutes).toBe(180);
      expect(report.averageMinutes).toBe(60);
      expect(report.byTag).toBeUndefined();
      expect(report.recentSessions?.map(line => line.id)).toEqual([s3, s2, s1]);
      expect(report.recentSessions?.[0]).toEqual({
        id: s3,
        startTime: '2026-10-19T09:00:00.000',
        durationMinutes: 60,
        description: 'Fix endpoint',
        tags: ['api'],
      });
    });

    it('breaks time down by tag with percentages of the total', () => {
      const report = buildSummaryReport({ period: { kind: 'days', days: 7 }, byTag: true }, store, NOW);

      expect(report.recentSessions).toBeUndefined();
      expect(report.byTag?.map(row => [row.tag, row.sessionCount, row.totalMinutes])).toEqual([
        ['api', 2, 150],
        ['backend', 1, 90],
        ['docs', 1, 30],
      ]);
      expect(report.byTag?.[0]?.percentage).toBeCloseTo(83.333, 2);
      expect(report.byTag?.[1]?.percentage).toBe(50);
      expect(report.byTag?.[2]?.percentage).toBeCloseTo(16.667, 2);
    });

    it('breaks time down by day in date order', () => {
      const report = buildSummaryReport({ period: { kind: 'days', days: 7 }, byDay: true }, store, NOW);

      expect(report.byDay).toEqual([
        { date: '2026-10-15', sessionCount: 1, totalMinutes: 90 },
        { date: '2026-10-17', sessionCount: 1, totalMinutes: 30 },
        { date: '2026-10-19', sessionCount: 1, totalMinutes: 60 },
      ]);
    });

    it('uses explicit range bounds as given', () => {
      const report = buildSummaryReport({
        period: { kind: 'range', start: new Date(2026, 9, 15), end: endOfDay(new Date(2026, 9, 17)) },
      }, store, NOW);

      expect(report.periodDescription).toBe('Oct 15 to Oct 17, 2026');
      expect(report.recentSessions?.map(line => line.id)).toEqual([s2, s1]);
      expect(report.totalMinutes).toBe(120);
    });

    it('covers everything for all time', () => {
      const report = buildSummaryReport({ period: { kind: 'all' } }, store, NOW);

      expect(report.periodDescription).toBe('All Time');
      expect(report.period).toEqual({ start: null, end: null });
      expect(report.sessionCount).toBe(4);
      expect(report.totalMinutes).toBe(240);
    });
  });

  it('lists at most ten recent sessions with truncated descriptions', () => {
    const long = 'Investigate flaky integration test in the payment service';
    for (let hour = 0; hour < 12; hour++) {
      worked(new Date(2026, 9, 19, hour, 0, 0), new Date(2026, 9, 19, hour, 20, 0), `${hour} ${long}`);
    }

    const report = buildSummaryReport({ period: { kind: 'all' } }, store, NOW);

    expect(report.sessionCount).toBe(12);
    expect(report.recentSessions).toHaveLength(10);
    expect(report.recentSessions?.[0]?.description).toBe('11 Investigate flaky integration test in');
  });

  it('keeps whole characters when truncating a recent description', () => {
    const id = worked(new Date(2026, 9, 19, 9, 0, 0), new Date(2026, 9, 19, 9, 30, 0), 'x'.repeat(39) + '\u{1F680} launch');

    const report = buildSummaryReport({ period: { kind: 'all' } }, store, NOW);

    expect(report.recentSessions?.[0]).toMatchObject({ id, description: 'x'.repeat(39) + '\u{1F680}' });
  });

  it('sums tag shares to exactly 100 when each session has one tag', () => {
    worked(new Date(2026, 9, 19, 8, 0, 0), new Date(2026, 9, 19, 9, 0, 0), 'Endpoint', ['api']);
    worked(new Date(2026, 9, 19, 9, 0, 0), new Date(2026, 9, 19, 9, 30, 0), 'Guide', ['docs']);
    worked(new Date(2026, 9, 19, 10, 0, 0), new Date(2026, 9, 19, 10, 30, 0), 'Deploy', ['ops']);

    const report = buildSummaryReport({ period: { kind: 'all' }, byTag: true }, store, NOW);

    expect(report.byTag?.map(row => [row.tag, row.percentage])).toEqual([
      ['api', 50],
      ['docs', 25],
      ['ops', 25],
    ]);
    expect(report.byTag?.reduce((sum, row) => sum + row.percentage, 0)).toBe(100);
  });

  it('counts a multi-tag session toward every one of its tags', () => {
    worked(new Date(2026, 9, 19, 8, 0, 0), new Date(2026, 9, 19, 9, 0, 0), 'Pairing', ['api', 'docs']);

    const report = buildSummaryReport({ period: { kind: 'all' }, byTag: true }, store, NOW);

    expect(report.totalMinutes).toBe(60);
    expect(report.byTag?.map(row => [row.tag, row.totalMinutes, row.percentage])).toEqual([
      ['api', 60, 100],
      ['docs', 60, 100],
    ]);
  });

  it('reports zero percentages and average for an all-zero period', () => {
    worked(new Date(2026, 9, 19, 10, 0, 0), new Date(2026, 9, 19, 10, 0, 30), 'Blip', ['ops']);

    const report = buildSummaryReport({ period: { kind: 'all' }, byTag: true }, store, NOW);

    expect(report.sessionCount).toBe(1);
    expect(report.totalMinutes).toBe(0);
    expect(report.averageMinutes).toBe(0);
    expect(report.byTag).toEqual([{ tag: 'ops', sessionCount: 1, totalMinutes: 0, percentage: 0 }]);
  });

  it('reports zero average when nothing is completed', () => {
    const report = buildSummaryReport({ period: { kind: 'days', days: 30 } }, store, NOW);

    expect(report.periodDescription).toBe('Last 30 Days');
    expect(report).toMatchObject({ sessionCount: 0, totalMinutes: 0, averageMinutes: 0, recentSessions: [] });
  });

  describe('buildDayReport', () => {
    it('lists the completed sessions of one local day in order', () => {
      worked(new Date(2026, 9, 18, 23, 30, 0), new Date(2026, 9, 19, 0, 10, 0), 'Late night');
      const morning = worked(new Date(2026, 9, 19, 9, 0, 0), new Date(2026, 9, 19, 10, 0, 0), 'Morning', ['api'], 'shipped');
      const afternoon = worked(new Date(2026, 9, 19, 14, 0, 0), new Date(2026, 9, 19, 14, 45, 0), 'Afternoon');
      worked(new Date(2026, 9, 20, 0, 0, 0), new Date(2026, 9, 20, 0, 30, 0), 'Next day');
      vi.setSystemTime(new Date(2026, 9, 20, 1, 0, 0));
      startSession('Active', [], store);

      const report = buildDayReport(new Date(2026, 9, 19, 17, 0, 0), store);

      expect(report.date).toBe('2026-10-19');
      expect(report.sessionCount).toBe(2);
      expect(report.totalMinutes).toBe(105);
      expect(report.sessions.map(s => s.id)).toEqual([morning, afternoon]);
      expect(report.sessions[0]).toEqual({
        id: morning,
        startTime: '2026-10-19T09:00:00.000',
        endTime: '2026-10-19T10:00:00.000',
        durationMinutes: 60,
        description: 'Morning',
        tags: ['api'],
        notes: 'shipped',
      });
    });

    it('is empty for a day without sessions', () => {
      expect(buildDayReport(new Date(2026, 9, 1), store)).toEqual({
        date: '2026-10-01',
        sessionCount: 0,
        totalMinutes: 0,
        sessions: [],
      });
    });
  });
});

describe('describePeriod', () => {
  it('uses fixed names for 1, 7 and 30 days', () => {
    expect(describePeriod({ kind: 'days', days: 1 }, NOW)).toBe('Today');
    expect(describePeriod({ kind: 'days', days: 7 }, NOW)).toBe('Last 7 Days');
    expect(describePeriod({ kind: 'days', days: 30 }, NOW)).toBe('Last 30 Days');
  });

  it('shows other day counts as the range they cover', () => {
    expect(describePeriod({ kind: 'days', days: 14 }, NOW)).toBe('Oct 05 to Oct 19, 2026');
  });

  it('formats a complete range', () => {
    expect(describePeriod({ kind: 'range', start: new Date(2026, 8, 1), end: new Date(2026, 9, 3) }, NOW))
      .toBe('Sep 01 to Oct 03, 2026');
  });

  it('falls back to All Time', () => {
    expect(describePeriod({ kind: 'range', start: new Date(2026, 8, 1) }, NOW)).toBe('All Time');
    expect(describePeriod({ kind: 'all' }, NOW)).toBe('All Time');
  });
});
