/**
 * Error type with exit code integration.
 */

import { ExitCode, getExitCodeName } from '../types/exit-codes.js';

/**
 * Structured error for todo operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class TodoError extends Error {
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
    this.name = 'TodoError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Structured JSON representation for `--json` output. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix !== undefined && { fix: this.fix }),
      },
    };
  }
}

/** Error for a task id that is not in the collection. */
export function taskNotFound(taskId: number): TodoError {
  return new TodoError(ExitCode.NOT_FOUND, `Task #${taskId} not found`, {
    fix: `Run 'todo list' to see existing task ids`,
  });
}
