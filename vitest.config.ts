import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
