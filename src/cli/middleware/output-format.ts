/**
 * Output format resolution from the --json flag and configured default.
 */

import type { OutputFormat } from '../../types/config.js';

/**
 * Resolve the output format from commander option values.
 * `--json` wins; otherwise the configured default applies.
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configDefault: OutputFormat,
): OutputFormat {
  return opts['json'] === true ? 'json' : configDefault;
}
