/**
 * Path resolution for worklog data.
 *
 * Environment variables:
 *   WORKLOG_HOME - Data directory (default: ~/.worklog)
 */

import { join } from 'node:path';
import { homedir } from 'node:os';

/** Database file name within the home directory. */
export const DB_FILENAME = 'worklog.db';

/** Config file name within the home directory. */
export const CONFIG_FILENAME = 'config.json';

/**
 * Get the worklog home directory.
 * Respects WORKLOG_HOME env var, defaults to ~/.worklog.
 */
export function getWorklogHome(): string {
  return process.env['WORKLOG_HOME'] ?? join(homedir(), '.worklog');
}

/** Get the default database path. */
export function getDefaultDbPath(): string {
  return join(getWorklogHome(), DB_FILENAME);
}

/** Get the config file path. */
export function getConfigPath(): string {
  return join(getWorklogHome(), CONFIG_FILENAME);
}
