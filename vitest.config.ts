import { defineConfig } from 'vitest/config';

process.env.NODE_NO_WARNINGS ??= '1';
// Timestamp rendering depends on the local zone.
process.env.TZ = 'UTC';

/**
 * Vitest configuration for todo-cli.
 */
export default defineConfig({
  test: {
    globals: true,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
    pool: 'forks'
  },
});
