import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [
    // Resolve @schema-rules/core to its sources through the root paths
    tsconfigPaths({
      projects: [fileURLToPath(new URL('../../tsconfig.json', import.meta.url))],
    }),
  ],
  test: {
    name: 'cli',
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
  },
});
