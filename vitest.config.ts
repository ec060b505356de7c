/**
 * Vitest configuration for the flakelens workspace
 *
 * Runs every package's unit and route tests in a plain node environment.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,

    include: [
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
  },
});
