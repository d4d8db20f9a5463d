/**
 * SQLite-backed session store operations.
 *
 * Durable CRUD and filtered retrieval over sessions and tags. No business
 * rules beyond referential integrity: callers enforce the single active
 * session and validate descriptions.
 */

import { and, asc, countDistinct, desc, eq, gte, inArray, isNotNull, isNull, lte, or, sql } from 'drizzle-orm';
import type { SQL } from 'drizzle-orm';
import * as schema from './schema.js';
import type { SessionRow } from './schema.js';
import type { WorklogDb } from './sqlite.js';
import type { Session, SessionFilters, TagSummaryRow } from '../types/session.js';
import { minutesBetween, parseLocalIso, toLocalIso } from '../core/time.js';
import { getLogger } from '../core/logger.js';

/** Default cap on filtered queries. */
export const DEFAULT_QUERY_LIMIT = 100;

/** Session store interface. All operations are synchronous. */
export interface SessionStore {
  /** Database path this store writes to. */
  readonly path: string;

  /** Insert an active session with its tags. Returns the new id. */
  createSession(description: string, tags: string[]): number;

  /**
   * Stamp end time, duration and notes on an active session.
   * Returns false when the id is unknown or the session already ended.
   */
  endSession(id: number, notes?: string | null): boolean;

  /** Get one session with its tags. */
  getSession(id: number): Session | null;

  /** Get the active session; the most recently started if several exist. */
  getActiveSession(): Session | null;

  /** Query sessions, newest first. */
  getSessions(filters?: SessionFilters): Session[];

  /** Aggregate completed-session minutes per tag, largest first. */
  getTagSummary(startDate?: Date, endDate?: Date): TagSummaryRow[];

  /** Tags of one session in insertion order. */
  getSessionTags(id: number): string[];

  /** Delete a session and its tags. Returns whether a row was removed. */
  deleteSession(id: number): boolean;

  /** Total number of stored sessions. */
  countSessions(): number;
}

// === ROW <-> DOMAIN CONVERSION ===

function rowToSession(row: SessionRow, tags: string[]): Session {
  return {
    id: row.id,
    description: row.description,
    startTime: row.startTime,
    endTime: row.endTime,
    durationMinutes: row.duration,
    notes: row.notes,
    createdAt: row.createdAt,
    tags,
  };
}

/** Lower-case and trim a tag the way it is stored. */
export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/** Escape LIKE wildcards so the term matches literally (ESCAPE '\'). */
export function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, '\\$&');
}

/**
 * Create a session store over a drizzle database.
 */
export function createSessionStore(db: WorklogDb, path: string): SessionStore {
  const log = getLogger('store');

  function loadTags(ids: number[]): Map<number, string[]> {
    const byId = new Map<number, string[]>();
    if (ids.length === 0) return byId;

    const rows = db.select({ sessionId: schema.tags.sessionId, tag: schema.tags.tag })
      .from(schema.tags)
      .where(inArray(schema.tags.sessionId, ids))
      .orderBy(asc(schema.tags.id))
      .all();

    for (const row of rows) {
      const list = byId.get(row.sessionId);
      if (list) {
        list.push(row.tag);
      } else {
        byId.set(row.sessionId, [row.tag]);
      }
    }
    return byId;
  }

  function withTags(rows: SessionRow[]): Session[] {
    const tagsById = loadTags(rows.map(r => r.id));
    return rows.map(r => rowToSession(r, tagsById.get(r.id) ?? []));
  }

  function periodConditions(startDate?: Date, endDate?: Date): SQL[] {
    const conditions: SQL[] = [];
    if (startDate) conditions.push(gte(schema.sessions.startTime, toLocalIso(startDate)));
    if (endDate) conditions.push(lte(schema.sessions.startTime, toLocalIso(endDate)));
    return conditions;
  }

  return {
    path,

    createSession(description, tags) {
      const now = toLocalIso(new Date());

      const id = db.transaction((tx) => {
        const result = tx.insert(schema.sessions).values({
          description,
          startTime: now,
          createdAt: now,
        }).run();
        const sessionId = Number(result.lastInsertRowid);

        if (tags.length > 0) {
          tx.insert(schema.tags)
            .values(tags.map(tag => ({ sessionId, tag: normalizeTag(tag) })))
            .run();
        }
        return sessionId;
      });

      log.info({ id, tags: tags.length }, 'Session created');
      return id;
    },

    endSession(id, notes) {
      const ended = db.transaction((tx) => {
        const row = tx.select({ startTime: schema.sessions.startTime, endTime: schema.sessions.endTime })
          .from(schema.sessions)
          .where(eq(schema.sessions.id, id))
          .get();

        if (!row) return false;
        if (row.endTime !== null) {
          log.warn({ id, endTime: row.endTime }, 'Session already ended; not overwriting');
          return false;
        }

        const start = parseLocalIso(row.startTime);
        const now = new Date();
        // end_time never precedes start_time, even if the clock stepped back
        const end = now.getTime() < start.getTime() ? start : now;

        tx.update(schema.sessions)
          .set({
            endTime: toLocalIso(end),
            duration: minutesBetween(start, end),
            notes: notes ?? null,
          })
          .where(and(eq(schema.sessions.id, id), isNull(schema.sessions.endTime)))
          .run();
        return true;
      });

      if (ended) log.info({ id }, 'Session ended');
      return ended;
    },

    getSession(id) {
      const row = db.select().from(schema.sessions)
        .where(eq(schema.sessions.id, id))
        .get();
      if (!row) return null;
      return withTags([row])[0] ?? null;
    },

    getActiveSession() {
      const row = db.select().from(schema.sessions)
        .where(isNull(schema.sessions.endTime))
        .orderBy(desc(schema.sessions.startTime), desc(schema.sessions.id))
        .limit(1)
        .get();
      if (!row) return null;
      return withTags([row])[0] ?? null;
    },

    getSessions(filters = {}) {
      const conditions = periodConditions(filters.startDate, filters.endDate);

      const tag = filters.tag !== undefined ? normalizeTag(filters.tag) : '';
      if (tag) {
        conditions.push(inArray(
          schema.sessions.id,
          db.select({ id: schema.tags.sessionId }).from(schema.tags).where(eq(schema.tags.tag, tag)),
        ));
      }

      if (filters.searchTerm) {
        const pattern = `%${escapeLike(filters.searchTerm)}%`;
        const match = or(
          sql`${schema.sessions.description} LIKE ${pattern} ESCAPE '\\'`,
          sql`${schema.sessions.notes} LIKE ${pattern} ESCAPE '\\'`,
        );
        if (match) conditions.push(match);
      }

      const rows = db.select().from(schema.sessions)
        .where(and(...conditions))
        .orderBy(desc(schema.sessions.startTime), desc(schema.sessions.id))
        .limit(filters.limit ?? DEFAULT_QUERY_LIMIT)
        .all();

      log.debug({ filters, count: rows.length }, 'Sessions queried');
      return withTags(rows);
    },

    getTagSummary(startDate, endDate) {
      const totalMinutes = sql<number>`coalesce(sum(${schema.sessions.duration}), 0)`.mapWith(Number);

      return db.select({
        tag: schema.tags.tag,
        sessionCount: countDistinct(schema.sessions.id),
        totalMinutes,
      })
        .from(schema.tags)
        .innerJoin(schema.sessions, eq(schema.tags.sessionId, schema.sessions.id))
        .where(and(isNotNull(schema.sessions.duration), ...periodConditions(startDate, endDate)))
        .groupBy(schema.tags.tag)
        .orderBy(desc(totalMinutes), asc(schema.tags.tag))
        .all();
    },

    getSessionTags(id) {
      return loadTags([id]).get(id) ?? [];
    },

    deleteSession(id) {
      const result = db.transaction((tx) =>
        tx.delete(schema.sessions).where(eq(schema.sessions.id, id)).run(),
      );
      const deleted = result.changes > 0;
      log.info({ id, deleted }, 'Session delete');
      return deleted;
    },

    countSessions() {
      const row = db.select({ count: sql<number>`count(*)`.mapWith(Number) })
        .from(schema.sessions)
        .get();
      return row?.count ?? 0;
    },
  };
}
