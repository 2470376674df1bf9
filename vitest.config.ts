import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
    // Keeps test output readable; logger.test.ts sets its own level.
    env: { LOG_LEVEL: 'error' },
  },
});
