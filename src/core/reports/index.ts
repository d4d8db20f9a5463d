/**
 * Summary and day reports as structured data.
 *
 * Reports only count completed sessions. Rendering lives in the CLI
 * renderers; nothing here formats text except the period description.
 */

import type { SessionStore } from '../../store/session-store.js';
import { getSessionStore } from '../../store/sqlite.js';
import type { Session } from '../../types/session.js';
import type {
  DayBreakdown,
  DayReport,
  DayReportEntry,
  ReportPeriod,
  ReportSessionLine,
  SummaryReport,
  SummaryReportOptions,
  TagBreakdown,
} from '../../types/report.js';
import { assertValidDays } from '../sessions/period.js';
import { formatMediumDate, formatShortDate, truncate } from '../format.js';
import { addDays, endOfDay, parseLocalIso, startOfDay, toDateKey, toLocalIso } from '../time.js';

/** Most sessions a single report looks at. */
export const REPORT_SESSION_LIMIT = 1000;

/** Recent sessions listed in a summary without a tag breakdown. */
export const RECENT_SESSION_COUNT = 10;

/** Description width in the recent-session list. */
export const REPORT_DESCRIPTION_WIDTH = 40;

type CompletedSession = Session & { durationMinutes: number };

function isCompleted(session: Session): session is CompletedSession {
  return session.durationMinutes !== null;
}

/**
 * Human description of a report period.
 * 1, 7 and 30 days have names; any other bounded period is shown as a date
 * range, and a period missing either bound is "All Time".
 */
export function describePeriod(period: ReportPeriod, now: Date = new Date()): string {
  if (period.kind === 'days') {
    if (period.days === 1) return 'Today';
    if (period.days === 7) return 'Last 7 Days';
    if (period.days === 30) return 'Last 30 Days';
  }

  const { start, end } = resolveReportRange(period, now);
  if (start && end) {
    return `${formatShortDate(start)} to ${formatMediumDate(end)}`;
  }
  return 'All Time';
}

/** Concrete bounds of a period at `now`. */
export function resolveReportRange(
  period: ReportPeriod,
  now: Date = new Date(),
): { start?: Date; end?: Date } {
  switch (period.kind) {
    case 'days':
      assertValidDays(period.days);
      return { start: addDays(now, -period.days), end: now };
    case 'range':
      return { start: period.start, end: period.end };
    case 'all':
      return {};
  }
}

function groupByDay(sessions: readonly CompletedSession[]): DayBreakdown[] {
  const byDay = new Map<string, DayBreakdown>();
  for (const session of sessions) {
    const date = toDateKey(parseLocalIso(session.startTime));
    const entry = byDay.get(date) ?? { date, sessionCount: 0, totalMinutes: 0 };
    entry.sessionCount++;
    entry.totalMinutes += session.durationMinutes;
    byDay.set(date, entry);
  }
  return [...byDay.values()].sort((a, b) => a.date.localeCompare(b.date));
}

function toReportLine(session: CompletedSession): ReportSessionLine {
  return {
    id: session.id,
    startTime: session.startTime,
    durationMinutes: session.durationMinutes,
    description: truncate(session.description, REPORT_DESCRIPTION_WIDTH),
    tags: session.tags,
  };
}

/**
 * Build a summary report for a period.
 *
 * With `byTag` the report carries the tag breakdown; otherwise it lists the
 * most recent completed sessions. `byDay` adds a per-day breakdown either way.
 */
export function buildSummaryReport(
  options: SummaryReportOptions,
  store: SessionStore = getSessionStore(),
  now: Date = new Date(),
): SummaryReport {
  const { start, end } = resolveReportRange(options.period, now);

  const sessions = store.getSessions({ startDate: start, endDate: end, limit: REPORT_SESSION_LIMIT });
  const completed = sessions.filter(isCompleted);
  const totalMinutes = completed.reduce((sum, s) => sum + s.durationMinutes, 0);

  const report: SummaryReport = {
    periodDescription: describePeriod(options.period, now),
    period: {
      start: start ? toLocalIso(start) : null,
      end: end ? toLocalIso(end) : null,
    },
    sessionCount: completed.length,
    totalMinutes,
    averageMinutes: completed.length > 0 ? totalMinutes / completed.length : 0,
  };

  if (options.byTag) {
    report.byTag = store.getTagSummary(start, end).map((row): TagBreakdown => ({
      tag: row.tag,
      sessionCount: row.sessionCount,
      totalMinutes: row.totalMinutes,
      percentage: totalMinutes > 0 ? (row.totalMinutes / totalMinutes) * 100 : 0,
    }));
  } else {
    report.recentSessions = completed.slice(0, RECENT_SESSION_COUNT).map(toReportLine);
  }

  if (options.byDay) {
    report.byDay = groupByDay(completed);
  }

  return report;
}

/**
 * Build the detailed report of one local calendar day, in chronological order.
 */
export function buildDayReport(date: Date, store: SessionStore = getSessionStore()): DayReport {
  const dayStart = startOfDay(date);
  const dayEnd = endOfDay(date);

  const completed = store
    .getSessions({ startDate: dayStart, endDate: dayEnd, limit: REPORT_SESSION_LIMIT })
    .filter(isCompleted)
    .reverse();

  const sessions = completed.map((s): DayReportEntry => ({
    id: s.id,
    startTime: s.startTime,
    endTime: s.endTime,
    durationMinutes: s.durationMinutes,
    description: s.description,
    tags: s.tags,
    notes: s.notes,
  }));

  return {
    date: toDateKey(dayStart),
    sessionCount: sessions.length,
    totalMinutes: sessions.reduce((sum, s) => sum + s.durationMinutes, 0),
    sessions,
  };
}
