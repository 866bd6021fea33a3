import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Retry and polling delays are injected, so nothing here should wait on a real clock
    testTimeout: 10000,
    reporters: ['default'],
  },
});
