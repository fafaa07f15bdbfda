import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    testTimeout: 30000,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // forks pool: better-sqlite3 native bindings and process.on signal handlers
    pool: 'forks',
  },
});
