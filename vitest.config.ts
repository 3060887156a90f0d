import { defineConfig } from 'vitest/config';

/**
 * Root configuration: each package is a Vitest project with its own config.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // Projects configuration for monorepo - each package is a project
    projects: ['packages/*'],

    // No retries - surface issues immediately
    retry: 0,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
