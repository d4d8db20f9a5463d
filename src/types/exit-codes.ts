/**
 * worklog exit codes.
 * Ranges: 0 = success, 1-99 = errors, 100+ = special (non-error) states.
 */

export enum ExitCode {
  // === SUCCESS (0) ===
  SUCCESS = 0,

  // === GENERAL ERRORS (1-9) ===
  GENERAL_ERROR = 1,
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  NOT_FOUND = 4,
  CONFIG_ERROR = 8,

  // === SESSION ERRORS (30-39) ===
  ALREADY_ACTIVE = 30,
  NO_ACTIVE_SESSION = 31,
  EMPTY_DESCRIPTION = 32,

  // === SPECIAL (100+) ===
  NO_DATA = 100,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
