/**
 * Path resolution for todo data files.
 *
 * Environment variables:
 *   TODO_DATA_DIR - Data directory (default: the package install location)
 *
 * Everything resolves against the data directory, never the caller's
 * working directory.
 */

import { isAbsolute, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

/** Config file name inside the data directory. */
export const CONFIG_FILE_NAME = 'todo.config.json';

/**
 * Get the package install directory.
 * Both src/core/paths.ts and dist/core/paths.js sit two levels below it.
 */
export function getInstallDir(): string {
  return fileURLToPath(new URL('../..', import.meta.url));
}

/**
 * Get the data directory.
 * Respects TODO_DATA_DIR, defaults to the install directory.
 */
export function getDataDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env['TODO_DATA_DIR'];
  if (override) return resolve(override);
  return getInstallDir();
}

/** Resolve a data-relative path to an absolute path. */
export function resolveDataPath(dataDir: string, relativePath: string): string {
  if (isAbsolute(relativePath)) return relativePath;
  return join(dataDir, relativePath);
}

/** Get the path to the config file. */
export function getConfigPath(dataDir: string): string {
  return join(dataDir, CONFIG_FILE_NAME);
}
