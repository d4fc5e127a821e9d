import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Keep pino quiet and synchronous under test
    env: {
      NODE_ENV: 'test',
      PLAN_DIGEST_LOG_LEVEL: 'silent',
    },
    testTimeout: process.env.CI ? 60000 : 30000,
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['test/**', 'dist/**'],
    },
  },
});
