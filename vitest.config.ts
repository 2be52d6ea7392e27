import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./vitest.setup.ts'],
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Several suites stub process.env and console; keep files isolated from each other
    fileParallelism: false,
    testTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/index.ts', // Re-exports only
        'packages/*/src/types.ts', // Type definitions only
        'packages/cli/src/bin.ts', // CLI entry point
      ],
    },
  },
});
