import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@fibermeta/core': fileURLToPath(new URL('./core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['core/tests/**/*.test.ts', 'service/tests/**/*.test.ts'],
    globals: false,
    environment: 'node',
    // better-sqlite3 is a native module; keep it in forked workers
    pool: 'forks',
    isolate: true,
    // Disable watch mode by default (use vitest --watch explicitly)
    watch: false,
    // Timeouts to prevent hanging tests
    testTimeout: 30000,
    hookTimeout: 10000,
  },
});
