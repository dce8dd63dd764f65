/**
 * Configuration type definitions.
 * Resolved from defaults, the data directory's config file, then environment.
 */

/** Output format options. */
export type OutputFormat = 'human' | 'json';

/** pino level names accepted in config. */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** Storage configuration. */
export interface StorageConfig {
  /** Tasks file name, relative to the data directory (or absolute). */
  fileName: string;
  /** Hold an exclusive file lock for each load-mutate-save cycle. */
  lock: boolean;
}

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  showUnicode: boolean;
}

/** Logging configuration for the pino logger. */
export interface LoggingConfig {
  level: LogLevel;
  /** Log file path, relative to the data directory. */
  filePath: string;
  /** Rotate after this many bytes. */
  maxFileSize: number;
  /** Rotated files to keep. */
  maxFiles: number;
}

/** Fully resolved configuration. */
export interface TodoConfig {
  storage: StorageConfig;
  output: OutputConfig;
  logging: LoggingConfig;
}
