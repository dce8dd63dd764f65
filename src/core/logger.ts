/**
 * Centralized pino logger factory.
 *
 * Singleton pattern. Uses pino-roll for file rotation and retention.
 * Custom formatters for uppercase level labels and ISO timestamps.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for command output, so diagnostics go to the log
 * file, or to stderr before initLogger has run.
 */

import pino from 'pino';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LoggingConfig } from '../types/config.js';
import { resolveDataPath } from './paths.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

const levelFormatter = (label: string) => ({ level: label.toUpperCase() });

/**
 * Convert bytes to a size string for pino-roll ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param dataDir - Absolute path to the data directory
 * @param config  - Logging section of the resolved config
 */
export function initLogger(dataDir: string, config: LoggingConfig): pino.Logger {
  const dest = resolveDataPath(dataDir, config.filePath);
  mkdirSync(dirname(dest), { recursive: true });

  // pino.transport() runs in a worker thread and is flushed on exit.
  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
        removeOtherLogFiles: true,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: { level: levelFormatter },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr logger at `warn`
 * so early startup code and tests never crash.
 *
 * @param subsystem - Logical subsystem name (e.g. 'store', 'cli')
 */
export function getLogger(subsystem: string): pino.Logger {
  if (rootLogger) return rootLogger.child({ subsystem });
  fallbackLogger ??= pino(
    {
      level: 'warn',
      formatters: { level: levelFormatter },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination(2),
  );
  return fallbackLogger.child({ subsystem });
}

/**
 * Discard all log output. For embedding callers that own stderr and want
 * no file logging either.
 */
export function silenceLogger(): void {
  rootLogger = pino({ level: 'silent' });
}

/**
 * Flush and close the logger. Call during shutdown.
 */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
