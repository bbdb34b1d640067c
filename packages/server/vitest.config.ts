import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'server',
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    env: {
      RELIEF_LOG_LEVEL: 'silent',
    },
    testTimeout: process.env.CI ? 60000 : 30000,
    hookTimeout: process.env.CI ? 60000 : 30000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['test/**', 'dist/**'],
    },
  },
});
