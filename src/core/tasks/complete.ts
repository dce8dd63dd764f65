/**
 * Task completion.
 */

import type { Task, TaskCollection } from '../../types/task.js';
import { findTaskById } from './find.js';

/**
 * Mark a task as completed.
 * Completing an already-completed task succeeds without change.
 * @returns the completed task, or undefined if no task has that id
 */
export function completeTask(taskId: number, tasks: TaskCollection): Task | undefined {
  const task = findTaskById(taskId, tasks);
  if (!task) return undefined;
  task.completed = true;
  return task;
}
