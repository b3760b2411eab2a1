/**
 * Vitest configuration for stream-bridge
 *
 * All tests run in Node.js against its built-in WHATWG streams, so no
 * browser or worker pool is needed.
 *
 *   npm test               # run every unit test once
 *   npm run test:coverage  # same, with v8 coverage
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false, // Keep deterministic order for debugging
    },

    include: ['tests/**/*.test.ts'],

    setupFiles: ['tests/setup.ts'],

    testTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['src/**/*.ts'],
      exclude: ['src/**/index.ts'],
      thresholds: {
        lines: 80,
        branches: 70,
        functions: 80,
        statements: 80,
      },
    },
  },
})
