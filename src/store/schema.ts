/**
 * Drizzle ORM schema for worklog.db (SQLite via better-sqlite3).
 *
 * Tables: sessions, tags
 * Timestamps are local wall-clock ISO strings without offset.
 */

import {
  sqliteTable,
  text,
  integer,
  index,
} from 'drizzle-orm/sqlite-core';

// === SESSIONS TABLE ===

export const sessions = sqliteTable('sessions', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  description: text('description').notNull(),
  startTime: text('start_time').notNull(),
  endTime: text('end_time'),
  /** Minutes, written once at stop time. */
  duration: integer('duration'),
  notes: text('notes'),
  createdAt: text('created_at').notNull(),
}, (table) => [
  index('idx_sessions_start_time').on(table.startTime),
]);

// === TAGS TABLE ===

export const tags = sqliteTable('tags', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  sessionId: integer('session_id').notNull().references(() => sessions.id, { onDelete: 'cascade' }),
  tag: text('tag').notNull(),
}, (table) => [
  index('idx_tags_session_id').on(table.sessionId),
  index('idx_tags_tag').on(table.tag),
]);

// === TYPE EXPORTS ===

export type SessionRow = typeof sessions.$inferSelect;

/**
 * DDL matching the tables above. Applied with IF NOT EXISTS on every open,
 * so an existing database keeps its data.
 */
export const SCHEMA_DDL = [
  `CREATE TABLE IF NOT EXISTS sessions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    description TEXT NOT NULL,
    start_time TEXT NOT NULL,
    end_time TEXT,
    duration INTEGER,
    notes TEXT,
    created_at TEXT NOT NULL
  )`,
  `CREATE TABLE IF NOT EXISTS tags (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    session_id INTEGER NOT NULL REFERENCES sessions (id) ON DELETE CASCADE,
    tag TEXT NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_sessions_start_time ON sessions (start_time)',
  'CREATE INDEX IF NOT EXISTS idx_tags_session_id ON tags (session_id)',
  'CREATE INDEX IF NOT EXISTS idx_tags_tag ON tags (tag)',
] as const;
