/**
 * Session lifecycle operations (start/stop/status/list/search/delete/stats).
 *
 * Enforces the rules the store does not: one active session at a time,
 * non-empty descriptions and normalized tags. Every session returned after a
 * write is re-read from the store, so durations come from the persisted row.
 *
 * The active-session check is check-then-act: two processes starting at the
 * same moment can both pass it. worklog assumes a single process per database.
 */

import type { SessionStore } from '../../store/session-store.js';
import { getSessionStore } from '../../store/sqlite.js';
import type {
  ListSessionsOptions,
  Session,
  SessionStats,
  SessionStatusView,
} from '../../types/session.js';
import { WorklogError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { getLogger } from '../logger.js';
import { minutesBetween, parseLocalIso } from '../time.js';
import { normalizeTags } from './tags.js';
import { resolveListRange } from './period.js';

export { normalizeTags, splitTagArgs } from './tags.js';
export { resolveListRange, assertValidDays } from './period.js';

/** Default cap for list and search. */
export const DEFAULT_LIST_LIMIT = 50;

/** Cap used when aggregating a whole period. */
export const STATS_SESSION_LIMIT = 1000;

/** Read back a session that was just written. */
function requireSession(store: SessionStore, id: number): Session {
  const session = store.getSession(id);
  if (!session) {
    throw new WorklogError(ExitCode.NOT_FOUND, `Session not found: ${id}`);
  }
  return session;
}

/**
 * Start a new session.
 * @throws WorklogError ALREADY_ACTIVE when a session is running
 * @throws WorklogError EMPTY_DESCRIPTION when the description is blank
 */
export function startSession(
  description: string,
  tags: readonly string[] = [],
  store: SessionStore = getSessionStore(),
): Session {
  const active = store.getActiveSession();
  if (active) {
    throw new WorklogError(
      ExitCode.ALREADY_ACTIVE,
      `Session already in progress: ${active.description}`,
      { fix: "Stop it first with 'worklog stop'" },
    );
  }

  const trimmed = description.trim();
  if (!trimmed) {
    throw new WorklogError(ExitCode.EMPTY_DESCRIPTION, 'Description cannot be empty');
  }

  const id = store.createSession(trimmed, normalizeTags(tags));
  getLogger('sessions').info({ id }, 'Session started');
  return requireSession(store, id);
}

/**
 * Stop the active session, optionally recording notes.
 * @throws WorklogError NO_ACTIVE_SESSION when nothing is running
 */
export function stopSession(
  notes?: string | null,
  store: SessionStore = getSessionStore(),
): Session {
  const active = store.getActiveSession();
  if (!active) {
    throw new WorklogError(
      ExitCode.NO_ACTIVE_SESSION,
      'No active session to stop',
      { fix: "Start one with 'worklog start \"description\"'" },
    );
  }

  // Blank notes become null; anything else is kept as given.
  const storedNotes = notes !== undefined && notes !== null && notes.trim() !== '' ? notes : null;
  if (!store.endSession(active.id, storedNotes)) {
    throw new WorklogError(ExitCode.NOT_FOUND, `Session not found: ${active.id}`);
  }

  const stopped = requireSession(store, active.id);
  getLogger('sessions').info({ id: stopped.id, minutes: stopped.durationMinutes }, 'Session stopped');
  return stopped;
}

/** Get the active session, if any. */
export function getCurrentSession(store: SessionStore = getSessionStore()): Session | null {
  return store.getActiveSession();
}

/** Get the active session with its elapsed minutes at `now`. */
export function getSessionStatusView(
  now: Date = new Date(),
  store: SessionStore = getSessionStore(),
): SessionStatusView {
  const session = store.getActiveSession();
  if (!session) {
    return { active: false, session: null, elapsedMinutes: null };
  }
  return {
    active: true,
    session,
    elapsedMinutes: minutesBetween(parseLocalIso(session.startTime), now),
  };
}

/** List sessions for a period, newest first. */
export function listSessions(
  options: ListSessionsOptions = {},
  store: SessionStore = getSessionStore(),
): Session[] {
  const range = resolveListRange(options);
  return store.getSessions({
    startDate: range.start,
    endDate: range.end,
    tag: options.tag,
    limit: options.limit ?? DEFAULT_LIST_LIMIT,
  });
}

/**
 * Search descriptions and notes (case-insensitive substring).
 * @throws WorklogError INVALID_INPUT for a blank term
 */
export function searchSessions(
  term: string,
  limit: number = DEFAULT_LIST_LIMIT,
  store: SessionStore = getSessionStore(),
): Session[] {
  if (!term.trim()) {
    throw new WorklogError(ExitCode.INVALID_INPUT, 'Search term cannot be empty');
  }
  return store.getSessions({ searchTerm: term, limit });
}

/** Look up one session by id. */
export function findSession(id: number, store: SessionStore = getSessionStore()): Session | null {
  return store.getSession(id);
}

/** Delete a session by id. Returns false when it does not exist. */
export function deleteSession(id: number, store: SessionStore = getSessionStore()): boolean {
  return store.deleteSession(id);
}

/**
 * Totals and average over completed sessions of a period; the count of
 * everything listed (active included) is reported separately.
 */
export function getSessionStats(
  options: Pick<ListSessionsOptions, 'days' | 'today'> = {},
  store: SessionStore = getSessionStore(),
): SessionStats {
  const sessions = listSessions({ ...options, limit: STATS_SESSION_LIMIT }, store);

  let totalMinutes = 0;
  let sessionCount = 0;
  for (const session of sessions) {
    if (session.durationMinutes === null) continue;
    totalMinutes += session.durationMinutes;
    sessionCount++;
  }

  return {
    totalMinutes,
    sessionCount,
    avgMinutes: sessionCount > 0 ? totalMinutes / sessionCount : 0,
    totalIncludingActive: sessions.length,
  };
}
