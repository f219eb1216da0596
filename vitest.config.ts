import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
    testTimeout: 10000,
    clearMocks: true,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
