/**
 * worklog - personal time tracking backed by SQLite.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type {
  Session,
  SessionFilters,
  SessionStats,
  SessionStatus,
  SessionStatusView,
  ListSessionsOptions,
  TagSummaryRow,
} from './types/session.js';
export type {
  ReportPeriod,
  SummaryReport,
  SummaryReportOptions,
  DayReport,
} from './types/report.js';
export type { WorklogConfig } from './types/config.js';

// Core
export { WorklogError, isWorklogError } from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { formatDuration, formatTimeAgo } from './core/format.js';
export { parseDateString } from './core/time.js';
export { loadConfig } from './core/config.js';

// Sessions
export {
  startSession,
  stopSession,
  getCurrentSession,
  getSessionStatusView,
  listSessions,
  searchSessions,
  findSession,
  deleteSession,
  getSessionStats,
  normalizeTags,
  resolveListRange,
} from './core/sessions/index.js';

// Reports
export { buildSummaryReport, buildDayReport, describePeriod } from './core/reports/index.js';

// Store
export { createSessionStore } from './store/session-store.js';
export type { SessionStore } from './store/session-store.js';
export { openDatabase, getDb, getSessionStore, closeDb } from './store/sqlite.js';
