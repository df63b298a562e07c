import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // worker_threads are spawned by the standalone tests
    pool: 'forks',
    testTimeout: 10000,
  },
});
