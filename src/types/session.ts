/**
 * Session type definitions for worklog.
 */

/** Derived state of a session: active until it has an end time. */
export type SessionStatus = 'active' | 'completed';

/** One contiguous, named period of tracked work. */
export interface Session {
  id: number;
  description: string;
  /** Local wall-clock ISO timestamp (no offset). */
  startTime: string;
  /** Null while the session is active. */
  endTime: string | null;
  /** Floor-minute duration, written once when the session is stopped. */
  durationMinutes: number | null;
  notes: string | null;
  createdAt: string;
  /** Normalized tags in insertion order. */
  tags: string[];
}

/** Filters accepted by the store's session query. All combine with AND. */
export interface SessionFilters {
  /** Inclusive lower bound on start time. */
  startDate?: Date;
  /** Inclusive upper bound on start time. */
  endDate?: Date;
  /** Exact tag match, case-insensitive. */
  tag?: string;
  /** Case-insensitive substring of description or notes. */
  searchTerm?: string;
  limit?: number;
}

/** Per-tag aggregate over completed sessions. */
export interface TagSummaryRow {
  tag: string;
  sessionCount: number;
  totalMinutes: number;
}

/** Options for listing sessions by period. */
export interface ListSessionsOptions {
  days?: number;
  today?: boolean;
  tag?: string;
  limit?: number;
}

/** Concrete date range resolved from list options. */
export interface DateRange {
  start?: Date;
  end?: Date;
}

/** Aggregate statistics over a listing period. */
export interface SessionStats {
  totalMinutes: number;
  /** Completed sessions only. */
  sessionCount: number;
  avgMinutes: number;
  /** Every listed session, active ones included. */
  totalIncludingActive: number;
}

/** Status of the current session with its elapsed time. */
export interface SessionStatusView {
  active: boolean;
  session: Session | null;
  elapsedMinutes: number | null;
}

/** Get the status of a session from its end time. */
export function getSessionStatus(session: Pick<Session, 'endTime'>): SessionStatus {
  return session.endTime === null ? 'active' : 'completed';
}
