/**
 * worklog error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error class for worklog operations.
 * Carries an exit code, human-readable message, and an optional fix suggestion.
 */
export class WorklogError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'WorklogError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for machine-readable output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/** Check whether an error is a WorklogError carrying the given code. */
export function isWorklogError(err: unknown, code?: ExitCode): err is WorklogError {
  return err instanceof WorklogError && (code === undefined || err.code === code);
}
