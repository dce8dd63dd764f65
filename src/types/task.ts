/**
 * Task type definitions matching the on-disk tasks.json record shape.
 */

/**
 * A single to-do item.
 *
 * Field names follow the persisted JSON document, which is why
 * `created_at` is snake_case.
 */
export interface Task {
  /** Positive integer, unique within the collection. Never reassigned. */
  id: number;
  text: string;
  /** One-way flag: set by `complete`, never cleared. */
  completed: boolean;
  /**
   * ISO-8601 creation timestamp. Records written by older or hand-edited
   * files may lack it; renderers show `Unknown` in that case.
   */
  created_at?: string;
}

/** Ordered task list. Insertion order is display order. */
export type TaskCollection = Task[];

/** Completion filter for list views. */
export type TaskFilter = 'all' | 'pending' | 'done';
