import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

// Workspace packages export dist/ at runtime; tests run against sources
const sourceOf = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@wheelhouse/utils': sourceOf('utils'),
      '@wheelhouse/config': sourceOf('config'),
      '@wheelhouse/core': sourceOf('core'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Tests spawn real child processes and write temp directories
    testTimeout: 30000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        maxForks: 2,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/index.ts',  // Re-exports only
        'packages/*/src/types.ts',   // Type definitions only
        'packages/cli/src/bin.ts',  // CLI entry point
      ],
    },
  },
});
