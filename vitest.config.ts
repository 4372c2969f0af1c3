import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
    // Filesystem tests share the OS temp dir; keep them out of each other's way.
    fileParallelism: false,
  },
});
