/**
 * Exclusive file lock around a load-mutate-save cycle (proper-lockfile).
 */

import lockfile from 'proper-lockfile';
import { TodoError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';

const LOCK_OPTIONS = {
  retries: { retries: 5, minTimeout: 100, maxTimeout: 1000, factor: 2 },
  stale: 10_000,
  // The tasks file may not exist yet on first run.
  realpath: false,
};

async function acquire(filePath: string): Promise<() => Promise<void>> {
  try {
    const release = await lockfile.lock(filePath, LOCK_OPTIONS);
    getLogger('store').debug({ filePath }, 'lock acquired');
    return release;
  } catch (err) {
    throw new TodoError(ExitCode.LOCK_TIMEOUT, `Failed to acquire lock: ${filePath}`, {
      fix: 'Another todo process may be writing this file. Wait and retry.',
      cause: err,
    });
  }
}

/**
 * Run `fn` while holding an exclusive lock on `filePath`.
 * The lock is released when `fn` settles. The parent directory must exist.
 */
export async function withLock<T>(filePath: string, fn: () => Promise<T>): Promise<T> {
  const release = await acquire(filePath);
  try {
    return await fn();
  } finally {
    await release();
  }
}
