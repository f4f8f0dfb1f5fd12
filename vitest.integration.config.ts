import { defineConfig } from 'vitest/config';

// PostgreSQL-backed suites only; they need DATABASE_URL and share one database.
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.test.ts'],
    pool: 'forks',
    maxWorkers: 1,
    maxConcurrency: 1,
    testTimeout: 15_000,
  },
});
