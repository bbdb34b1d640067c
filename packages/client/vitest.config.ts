import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'client',
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
