/**
 * Task lookup.
 */

import type { Task } from '../../types/task.js';

/** Find a task by id. Returns undefined if absent. */
export function findTaskById(taskId: number, tasks: readonly Task[]): Task | undefined {
  return tasks.find(t => t.id === taskId);
}
