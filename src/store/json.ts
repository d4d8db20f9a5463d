/**
 * JSON file read/write for worklog settings files.
 */

import { atomicWrite, safeReadFile } from './atomic.js';
import { WorklogError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/**
 * Read and parse a JSON file.
 * Returns null if the file does not exist.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await safeReadFile(filePath);
  if (content === null) return null;

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (err) {
    throw new WorklogError(
      ExitCode.CONFIG_ERROR,
      `Invalid JSON in: ${filePath}`,
      { cause: err, fix: 'Fix or remove the file' },
    );
  }
}

/** Write JSON atomically with two-space indentation and a trailing newline. */
export async function saveJson(filePath: string, data: unknown): Promise<void> {
  await atomicWrite(filePath, JSON.stringify(data, null, 2) + '\n');
}
