import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Tests run against the core sources, not its build output
    alias: {
      '@continuum/core': fileURLToPath(new URL('./packages/continuum/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: [
      'packages/continuum/src/**/*.test.ts',
      'packages/continuum-cli/tests/**/*.test.ts',
    ],
    environment: 'node',
    testTimeout: 10000,
  },
});
