/**
 * @fileoverview Vitest configuration for the upgrade app
 *
 * @description
 * Suites run against an in-process PGlite database, so startup needs more
 * headroom than the default timeouts give.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
})
