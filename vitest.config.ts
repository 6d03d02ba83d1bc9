import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['door-reader/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10_000,
    env: {
      LOG_LEVEL: 'silent'
    }
  }
});
