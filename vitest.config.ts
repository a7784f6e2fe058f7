import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for lineage-investigator
 *
 * Every test runs in process: the decision maker and tools are fakes, the
 * SQLite stores use `:memory:` databases and `fetch` is stubbed.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
