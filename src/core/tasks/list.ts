/**
 * Task listing with completion filters.
 */

import type { Task, TaskFilter } from '../../types/task.js';

/**
 * Select tasks for display. Collection order is kept.
 */
export function listTasks(tasks: readonly Task[], filter: TaskFilter = 'all'): Task[] {
  switch (filter) {
    case 'pending': return tasks.filter(t => !t.completed);
    case 'done': return tasks.filter(t => t.completed);
    case 'all': return [...tasks];
  }
}
