/**
 * Task deletion.
 */

import type { Task, TaskCollection } from '../../types/task.js';

/**
 * Remove a task, keeping the order of the remaining ones.
 * @returns the removed task, or undefined if no task has that id
 */
export function deleteTask(taskId: number, tasks: TaskCollection): Task | undefined {
  const taskIdx = tasks.findIndex(t => t.id === taskId);
  if (taskIdx === -1) return undefined;
  const [removed] = tasks.splice(taskIdx, 1);
  return removed;
}
