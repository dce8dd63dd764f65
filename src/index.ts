/**
 * todo-cli - command-line task manager backed by a local JSON file.
 */

// Types
export { ExitCode } from './types/exit-codes.js';
export type { Task, TaskCollection, TaskFilter } from './types/task.js';
export type { TodoConfig } from './types/config.js';

// Core
export { TodoError } from './core/errors.js';
export { loadConfig } from './core/config.js';
export { getDataDir } from './core/paths.js';

// Tasks
export { nextId, addTask, findTaskById, completeTask, deleteTask, listTasks } from './core/tasks/index.js';

// Store
export {
  TaskStore, parseTaskFile, serializeTasks, withLock,
  type TaskStoreOptions, type ParseResult,
} from './store/index.js';

// CLI
export { runCli, createProgram, type CliOptions } from './cli/index.js';
