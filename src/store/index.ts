/**
 * Store layer exports.
 */

export { atomicWrite, safeReadFile } from './atomic.js';
export { withLock } from './lock.js';
export { parseTaskFile, serializeTasks, toRecord, NOT_AN_ARRAY, type ParseResult } from './codec.js';
export { TaskStore, type TaskStoreOptions } from './task-store.js';
