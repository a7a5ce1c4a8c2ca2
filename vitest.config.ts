import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@fingerboard/theory': new URL('./packages/theory/src/index.ts', import.meta.url).pathname,
      '@fingerboard/core': new URL('./packages/core/src/index.ts', import.meta.url).pathname,
    },
  },
  test: {
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      thresholds: {
        lines: 85,
        branches: 85,
        functions: 85,
        statements: 85,
      },
    },
  },
});
