/**
 * Human-readable renderers for task commands.
 *
 * Each renderer takes the same data shape that the JSON envelope carries
 * and returns a string suitable for terminal display.
 */

import type { Task } from '../../types/task.js';
import { DIM, GREEN, paint, statusMark } from './colors.js';

/** Display options shared by all renderers. */
export interface RenderOptions {
  colors: boolean;
  unicode: boolean;
}

/** Message shown for an empty listing. */
export const NO_TASKS_MESSAGE = 'No tasks found.';

/** Placeholder for a missing or unparsable timestamp. */
export const UNKNOWN_TIMESTAMP = 'Unknown';

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function formatLocal(date: Date): string {
  return `${pad(date.getFullYear(), 4)}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
    + `${pad(date.getHours())}:${pad(date.getMinutes())}`;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2) return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0 ? 29 : 28;
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

/**
 * Render an ISO-8601 timestamp as `YYYY-MM-DD HH:MM`.
 *
 * Timestamps with a zone (`Z`, `+02:00`) are shown in local time.
 * Zoneless ones are already local and are shown as written.
 * Returns `Unknown` for missing or unparsable input.
 */
export function formatTimestamp(value: string | undefined): string {
  if (value === undefined) return UNKNOWN_TIMESTAMP;
  const match = ISO_PATTERN.exec(value.trim());
  if (!match) return UNKNOWN_TIMESTAMP;

  const [, y = '', mo = '', d = '', h = '00', mi = '00', s = '00', zone] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  if (
    month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)
    || Number(h) > 23 || Number(mi) > 59 || Number(s) > 59
  ) {
    return UNKNOWN_TIMESTAMP;
  }

  if (zone === undefined) return `${y}-${mo}-${d} ${h}:${mi}`;

  const offset = zone === 'Z' ? 'Z' : zone.replace(/^([+-]\d{2}):?(\d{2})$/, '$1:$2');
  const instant = new Date(`${y}-${mo}-${d}T${h}:${mi}:${s}${offset}`);
  if (isNaN(instant.getTime())) return UNKNOWN_TIMESTAMP;
  return formatLocal(instant);
}

/** Format one task as `[id] [mark] text (timestamp)`. */
export function formatTask(task: Task, opts: RenderOptions): string {
  const mark = paint(GREEN, statusMark(task.completed, opts.unicode), opts.colors);
  const timestamp = paint(DIM, formatTimestamp(task.created_at), opts.colors);
  return `[${task.id}] [${mark}] ${task.text} (${timestamp})`;
}

// ---------------------------------------------------------------------------
// Command renderers
// ---------------------------------------------------------------------------

export function renderAdd(data: { task: Task }): string {
  return `Added task #${data.task.id}: ${data.task.text}`;
}

export function renderList(data: { tasks: Task[] }, opts: RenderOptions): string {
  if (data.tasks.length === 0) return NO_TASKS_MESSAGE;
  return data.tasks.map(t => formatTask(t, opts)).join('\n');
}

export function renderComplete(data: { task: Task }): string {
  return `Marked task #${data.task.id} as complete`;
}

export function renderDelete(data: { deletedTask: Task }): string {
  return `Deleted task #${data.deletedTask.id}`;
}
