/**
 * JSON envelope formatting for machine-readable output.
 *
 * Success: { success: true, operation, timestamp, result }
 * Error:   { success: false, error: { code, name, message, fix? } }
 */

import type { WorklogError } from './errors.js';

/** Successful command envelope. */
export interface SuccessEnvelope<T> {
  success: true;
  operation: string;
  timestamp: string;
  result: T;
}

/** Format a successful result as a JSON envelope. */
export function formatSuccess<T>(data: T, operation: string = 'cli.output'): string {
  const envelope: SuccessEnvelope<T> = {
    success: true,
    operation,
    timestamp: new Date().toISOString(),
    result: data,
  };
  return JSON.stringify(envelope);
}

/** Format an error as a JSON envelope. */
export function formatError(error: WorklogError): string {
  return JSON.stringify(error.toJSON());
}

