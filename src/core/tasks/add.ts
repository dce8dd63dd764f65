/**
 * Task creation and id assignment.
 */

import type { Task, TaskCollection } from '../../types/task.js';

/**
 * Next free task id: 1 for an empty collection, otherwise max id + 1.
 *
 * Ids are not reused. Deleting the highest task and adding again can
 * hand out that id only because the collection no longer shows it;
 * deleting any other task leaves a permanent gap.
 */
export function nextId(tasks: readonly Task[]): number {
  let max = 0;
  for (const task of tasks) {
    if (task.id > max) max = task.id;
  }
  return max + 1;
}

/**
 * Create a task and append it to the collection.
 * Empty text is accepted as-is.
 */
export function addTask(text: string, tasks: TaskCollection, now: Date = new Date()): Task {
  const task: Task = {
    id: nextId(tasks),
    text,
    completed: false,
    created_at: now.toISOString(),
  };
  tasks.push(task);
  return task;
}
