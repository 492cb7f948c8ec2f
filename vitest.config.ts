import { defineConfig } from 'vitest/config';

export default defineConfig({
  cacheDir: 'node_modules/.vite',
  test: {
    pool: 'threads',
    isolate: true,
    fileParallelism: true,
    globals: true,
    testTimeout: 5000,
    teardownTimeout: 1000,
    minWorkers: 1,
    maxWorkers: 4,
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
