/**
 * tasks.json encoding and decoding.
 *
 * Decoding never throws on bad input: it returns a ParseResult so the store
 * can decide how to recover. Encoding emits a stable field order.
 */

import { z } from 'zod';
import type { Task, TaskCollection } from '../types/task.js';

export const TaskRecordSchema = z.object({
  id: z.number().int().positive(),
  text: z.string(),
  completed: z.boolean(),
  // A bad timestamp renders as Unknown; it never invalidates the file.
  created_at: z.unknown().transform((value) => (typeof value === 'string' ? value : undefined)),
});

export const TaskFileSchema = z.array(TaskRecordSchema).superRefine((tasks, ctx) => {
  const seen = new Set<number>();
  tasks.forEach((task, index) => {
    if (seen.has(task.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [index, 'id'],
        message: `Duplicate task id ${task.id}`,
      });
    }
    seen.add(task.id);
  });
});

/** Outcome of decoding a tasks file. */
export type ParseResult =
  | { ok: true; tasks: TaskCollection }
  | { ok: false; reason: string };

/** Reason reported when the top-level value is not an array. */
export const NOT_AN_ARRAY = 'Tasks file must contain a JSON array';

/**
 * Decode the contents of a tasks file.
 */
export function parseTaskFile(content: string): ParseResult {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }

  if (!Array.isArray(raw)) {
    return { ok: false, reason: NOT_AN_ARRAY };
  }

  const parsed = TaskFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    return { ok: false, reason: `Invalid task record${where}: ${issue?.message ?? 'invalid value'}` };
  }

  return { ok: true, tasks: parsed.data };
}

/**
 * Copy a task with keys in persisted order. Absent timestamps stay absent.
 */
export function toRecord(task: Task): Task {
  return {
    id: task.id,
    text: task.text,
    completed: task.completed,
    ...(task.created_at !== undefined && { created_at: task.created_at }),
  };
}

/**
 * Encode a task collection as the tasks.json document.
 * 2-space indent, trailing newline, non-ASCII text kept verbatim.
 */
export function serializeTasks(tasks: readonly Task[]): string {
  return JSON.stringify(tasks.map(toRecord), null, 2) + '\n';
}
