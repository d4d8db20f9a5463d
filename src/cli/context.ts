/**
 * Per-invocation CLI runtime: resolved configuration and database path.
 *
 * Set once in the preAction hook; commands read the store through here so
 * the --db flag and storage.dbPath take effect everywhere.
 */

import { worklogConfigSchema } from '../types/config.js';
import type { WorklogConfig } from '../types/config.js';
import type { SessionStore } from '../store/session-store.js';
import { getSessionStore } from '../store/sqlite.js';
import { getDefaultDbPath } from '../core/paths.js';

interface CliRuntime {
  config: WorklogConfig;
  dbPath: string;
}

let runtime: CliRuntime | null = null;

/** Install the runtime for this invocation. */
export function setCliRuntime(config: WorklogConfig, dbPathFlag?: string): void {
  runtime = {
    config,
    dbPath: dbPathFlag ?? config.storage.dbPath ?? getDefaultDbPath(),
  };
}

/** Resolved configuration (schema defaults before setCliRuntime). */
export function getCliConfig(): WorklogConfig {
  return runtime?.config ?? worklogConfigSchema.parse({});
}

/** Session store on the configured database. */
export function getCliStore(): SessionStore {
  return getSessionStore(runtime?.dbPath ?? getDefaultDbPath());
}

/** Forget the runtime (tests). */
export function resetCliRuntime(): void {
  runtime = null;
}
