/**
 * Configuration engine.
 *
 * Resolution priority: Environment vars > Config file > Defaults
 *
 * The config file is `todo.config.json` in the data directory. Every layer
 * is merged first and validated once, so a bad value from any source is
 * reported the same way.
 */

import { z } from 'zod';
import type { TodoConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { TodoError } from './errors.js';
import { getConfigPath } from './paths.js';
import { safeReadFile } from '../store/atomic.js';

/** Default configuration values. */
export const DEFAULTS: TodoConfig = {
  storage: {
    fileName: 'tasks.json',
    lock: false,
  },
  output: {
    defaultFormat: 'human',
    showUnicode: true,
  },
  logging: {
    level: 'info',
    filePath: 'logs/todo.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const TodoConfigSchema: z.ZodType<TodoConfig> = z.object({
  storage: z.object({
    fileName: z.string().min(1),
    lock: z.boolean(),
  }),
  output: z.object({
    defaultFormat: z.enum(['human', 'json']),
    showUnicode: z.boolean(),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

/** Top-level shape of the config file; section contents are checked after merging. */
const ConfigFileSchema = z.record(z.string(), z.unknown());

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TODO_STORAGE_FILE': 'storage.fileName',
  'TODO_STORAGE_LOCK': 'storage.lock',
  'TODO_FORMAT': 'output.defaultFormat',
  'TODO_OUTPUT_SHOW_UNICODE': 'output.showUnicode',
  'TODO_LOG_LEVEL': 'logging.level',
  'TODO_LOG_FILE': 'logging.filePath',
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isPlainObject(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else {
      result[key] = sourceVal;
    }
  }
  return result;
}

/**
 * Parse an environment variable value to the appropriate type.
 */
export function parseEnvValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  const num = Number(value);
  if (!isNaN(num) && value.trim() !== '') return num;
  return value;
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid value';
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Read the config file layer. Returns an empty layer if the file is absent.
 */
async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  const content = await safeReadFile(configPath);
  if (content === null) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new TodoError(
      ExitCode.CONFIG_ERROR,
      `Invalid JSON in: ${configPath}`,
      { cause: err },
    );
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new TodoError(
      ExitCode.CONFIG_ERROR,
      `Config file must contain a JSON object: ${configPath}`,
    );
  }
  return parsed.data;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < config file < environment vars
 *
 * @param dataDir - Directory holding todo.config.json
 * @param env     - Environment to read TODO_* overrides from
 */
export async function loadConfig(
  dataDir: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<TodoConfig> {
  const configPath = getConfigPath(dataDir);

  // Layer 0: defaults (cloned so callers can't mutate them)
  let merged: Record<string, unknown> = JSON.parse(JSON.stringify(DEFAULTS));

  // Layer 1: config file
  merged = deepMerge(merged, await readConfigFile(configPath));

  // Layer 2: environment variables
  for (const [envKey, configKey] of Object.entries(ENV_MAP)) {
    const envValue = env[envKey];
    if (envValue !== undefined) {
      setNestedValue(merged, configKey, parseEnvValue(envValue));
    }
  }

  const result = TodoConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new TodoError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration (${describeIssue(result.error)})`,
      { fix: `Check ${configPath} and TODO_* environment variables` },
    );
  }
  return result.data;
}
