import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['packages/*/vitest.config.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      reportsDirectory: 'coverage',
      exclude: ['**/dist/**', '**/coverage/**', '**/*.d.ts', '**/tests/**/*.ts', '**/testing/**/*.ts'],
    },
  },
});
