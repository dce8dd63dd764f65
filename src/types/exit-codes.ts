/**
 * Process exit codes.
 * 0 = success, anything else is a failure the caller can branch on.
 */

export enum ExitCode {
  SUCCESS = 0,

  /** A referenced task id does not exist. */
  NOT_FOUND = 1,
  /** Usage error: missing argument, unknown command, malformed id. */
  INVALID_INPUT = 2,
  FILE_ERROR = 3,
  LOCK_TIMEOUT = 7,
  CONFIG_ERROR = 8,
}

/** Human-readable name for an exit code. */
export function getExitCodeName(code: ExitCode): string {
  return ExitCode[code] ?? 'UNKNOWN';
}
