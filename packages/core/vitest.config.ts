import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    // Configuration for property-based testing with fast-check
    testTimeout: 10000,
  },
});
