/**
 * Task id argument parsing.
 */

import { InvalidArgumentError } from 'commander';

/**
 * Commander argument parser for `<id>`: a decimal integer.
 * Ids that match no task (0, negatives) are left to the not-found path.
 */
export function parseTaskId(value: string): number {
  const id = Number(value);
  if (!/^[+-]?\d+$/.test(value) || !Number.isSafeInteger(id)) {
    throw new InvalidArgumentError('Task ID must be an integer.');
  }
  return id;
}
