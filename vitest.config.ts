import { defineConfig } from 'vitest/config';

/**
 * Workspace test configuration. Each package is a project with its own
 * vitest.config.ts; this file only wires them together and sets the
 * shared environment.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // ========================================================================
    // MONOREPO PROJECT CONFIGURATION
    // ========================================================================

    projects: ['packages/*'],

    // ========================================================================
    // DETERMINISTIC EXECUTION CONFIGURATION
    // ========================================================================

    // No retries - surface issues immediately
    retry: 0,
    fileParallelism: !isCI,
    testTimeout: isCI ? 30000 : 10000,

    // ========================================================================
    // COVERAGE CONFIGURATION
    // ========================================================================

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/test-utils/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      TEST_SEED: '424242',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
