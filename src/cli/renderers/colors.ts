/**
 * Terminal color and symbol utilities for human-readable CLI output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 * Falls back to plain text when the stream is not a TTY.
 */

/** Decide whether ANSI color escape codes should be used on a stream. */
export function colorsSupported(
  env: NodeJS.ProcessEnv = process.env,
  stream: { isTTY?: boolean } = process.stdout,
): boolean {
  if (env['NO_COLOR'] !== undefined) return false;
  if (env['FORCE_COLOR'] !== undefined) return true;
  return stream.isTTY === true;
}

// ---------------------------------------------------------------------------
// ANSI escape helpers
// ---------------------------------------------------------------------------

export const DIM = '\x1b[2m';
export const NC = '\x1b[0m';  // reset
export const GREEN = '\x1b[0;32m';

/** Wrap text in an escape code, or return it unchanged when color is off. */
export function paint(code: string, text: string, enabled: boolean): string {
  return enabled ? `${code}${text}${NC}` : text;
}

// ---------------------------------------------------------------------------
// Status marks
// ---------------------------------------------------------------------------

export const DONE_MARK_UNICODE = '✓';
export const DONE_MARK_ASCII = 'x';

/** Completion mark: a check for completed tasks, a blank otherwise. */
export function statusMark(completed: boolean, unicode: boolean): string {
  if (!completed) return ' ';
  return unicode ? DONE_MARK_UNICODE : DONE_MARK_ASCII;
}
