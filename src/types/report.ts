/**
 * Report type definitions.
 */

/** Period a summary report covers. */
export type ReportPeriod =
  | { kind: 'days'; days: number }
  | { kind: 'range'; start?: Date; end?: Date }
  | { kind: 'all' };

/** Options for a summary report. */
export interface SummaryReportOptions {
  period: ReportPeriod;
  byTag?: boolean;
  byDay?: boolean;
}

/** One tag's share of a period. */
export interface TagBreakdown {
  tag: string;
  sessionCount: number;
  totalMinutes: number;
  /** Share of the period total, 0-100. */
  percentage: number;
}

/** One calendar day's share of a period. */
export interface DayBreakdown {
  /** YYYY-MM-DD (local). */
  date: string;
  sessionCount: number;
  totalMinutes: number;
}

/** Condensed session line for summary reports. */
export interface ReportSessionLine {
  id: number;
  startTime: string;
  durationMinutes: number;
  /** Truncated to the report display width. */
  description: string;
  tags: string[];
}

/** Summary report over a period. */
export interface SummaryReport {
  periodDescription: string;
  period: {
    start: string | null;
    end: string | null;
  };
  sessionCount: number;
  totalMinutes: number;
  averageMinutes: number;
  byTag?: TagBreakdown[];
  byDay?: DayBreakdown[];
  recentSessions?: ReportSessionLine[];
}

/** Full detail of one completed session in a day report. */
export interface DayReportEntry {
  id: number;
  startTime: string;
  endTime: string | null;
  durationMinutes: number;
  description: string;
  tags: string[];
  notes: string | null;
}

/** Detailed report of one calendar day. */
export interface DayReport {
  /** YYYY-MM-DD (local). */
  date: string;
  sessionCount: number;
  totalMinutes: number;
  sessions: DayReportEntry[];
}
