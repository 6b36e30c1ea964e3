import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    environment: 'node',
    // worker thread pools start a TypeScript loader per thread
    testTimeout: 30_000,
  },
});
