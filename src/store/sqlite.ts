/**
 * SQLite store via drizzle-orm/better-sqlite3.
 *
 * better-sqlite3 is synchronous, so every drizzle query here runs to
 * completion before returning. File-backed databases use WAL mode;
 * ':memory:' is accepted for tests.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.js';
import { getDefaultDbPath } from '../core/paths.js';
import { getLogger } from '../core/logger.js';
import { createSessionStore, type SessionStore } from './session-store.js';

/** Drizzle database instance type. */
export type WorklogDb = BetterSQLite3Database<typeof schema>;

/** An open database: drizzle wrapper plus the native connection. */
export interface DatabaseHandle {
  db: WorklogDb;
  native: Database.Database;
  path: string;
}

/** In-memory database path. */
export const MEMORY_DB = ':memory:';

/** Singleton state for lazy initialization. */
let _handle: DatabaseHandle | null = null;
let _store: SessionStore | null = null;

/**
 * Open a database file, apply pragmas and create tables if missing.
 */
export function openDatabase(path: string): DatabaseHandle {
  const log = getLogger('sqlite');

  if (path !== MEMORY_DB) {
    mkdirSync(dirname(path), { recursive: true });
  }

  const native = new Database(path);
  native.pragma('busy_timeout = 5000');
  if (path !== MEMORY_DB) {
    native.pragma('journal_mode = WAL');
  }
  native.pragma('foreign_keys = ON');

  for (const statement of schema.SCHEMA_DDL) {
    native.exec(statement);
  }

  log.debug({ path }, 'Database opened');
  return { db: drizzle(native, { schema }), native, path };
}

/**
 * Get the process-wide database (lazy, singleton).
 * Reopens when a different path is requested.
 */
export function getDb(path: string = getDefaultDbPath()): DatabaseHandle {
  if (_handle && _handle.path !== path) {
    closeDb();
  }
  if (!_handle) {
    _handle = openDatabase(path);
  }
  return _handle;
}

/** Get the session store over the process-wide database. */
export function getSessionStore(path?: string): SessionStore {
  const handle = getDb(path);
  if (!_store || _store.path !== handle.path) {
    _store = createSessionStore(handle.db, handle.path);
  }
  return _store;
}

/** Close the database connection and release resources. Safe to call twice. */
export function closeDb(): void {
  if (_handle?.native.open) {
    _handle.native.close();
  }
  _handle = null;
  _store = null;
}
