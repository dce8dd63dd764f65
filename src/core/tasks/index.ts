/**
 * In-memory task operations. No I/O.
 */

export { nextId, addTask } from './add.js';
export { findTaskById } from './find.js';
export { completeTask } from './complete.js';
export { deleteTask } from './delete.js';
export { listTasks } from './list.js';
