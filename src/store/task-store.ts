/**
 * JSON-backed task storage.
 *
 * One TaskStore per tasks file. A command loads the collection, mutates it
 * in memory, and saves it back in full. There is no long-lived state.
 *
 * Without `lock`, concurrent invocations race and the last writer wins.
 */

import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { atomicWrite, safeReadFile } from './atomic.js';
import { parseTaskFile, serializeTasks } from './codec.js';
import { withLock } from './lock.js';
import { getLogger } from '../core/logger.js';
import type { Task, TaskCollection } from '../types/task.js';

/** Options for TaskStore. */
export interface TaskStoreOptions {
  /** Absolute path to the tasks file. */
  filePath: string;
  /** Hold an exclusive lock for each withLock() cycle. Default: false. */
  lock?: boolean;
  /** Receives user-facing diagnostics. Default: stderr. */
  onDiagnostic?: (message: string) => void;
}

function writeStderr(message: string): void {
  process.stderr.write(message + '\n');
}

export class TaskStore {
  readonly filePath: string;
  private readonly lock: boolean;
  private readonly onDiagnostic: (message: string) => void;

  constructor(options: TaskStoreOptions) {
    this.filePath = options.filePath;
    this.lock = options.lock ?? false;
    this.onDiagnostic = options.onDiagnostic ?? writeStderr;
  }

  /**
   * Load the task collection.
   *
   * A missing file is created empty. A corrupted file (bad JSON, a
   * non-array document, or malformed records) is reported, reset to `[]`,
   * and read as empty. Only I/O failures throw.
   */
  async load(): Promise<TaskCollection> {
    const content = await safeReadFile(this.filePath);
    if (content === null) {
      await this.save([]);
      return [];
    }

    const result = parseTaskFile(content);
    if (result.ok) return result.tasks;

    this.onDiagnostic(`Error: Corrupted tasks file detected (${result.reason}). Reinitializing...`);
    getLogger('store').warn({ filePath: this.filePath, reason: result.reason }, 'tasks file corrupted, reinitialized');
    await this.save([]);
    return [];
  }

  /**
   * Replace the tasks file with the given collection.
   */
  async save(tasks: readonly Task[]): Promise<void> {
    await atomicWrite(this.filePath, serializeTasks(tasks));
  }

  /**
   * Run a load-mutate-save cycle, under an exclusive file lock when the
   * store was created with `lock: true`.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (!this.lock) return fn();
    // The lock directory sits beside the tasks file.
    await mkdir(dirname(this.filePath), { recursive: true });
    return withLock(this.filePath, fn);
  }
}
