import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: [
      'api/src/**/__tests__/**/*.test.ts',
      'deploy/runtime/src/**/__tests__/**/*.test.ts',
      'cli/src/**/__tests__/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
