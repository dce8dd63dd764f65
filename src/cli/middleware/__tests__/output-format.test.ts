/**
 * Tests for output format resolution.
 */

import { describe, it, expect } from 'vitest';
import { resolveFormat } from '../output-format.js';

describe('resolveFormat', () => {
  it('uses json when --json is passed', () => {
    expect(resolveFormat({ json: true }, 'human')).toBe('json');
  });

  it('falls back to the configured default', () => {
    expect(resolveFormat({}, 'human')).toBe('human');
    expect(resolveFormat({}, 'json')).toBe('json');
  });
});
