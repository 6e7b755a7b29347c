import { defineConfig } from 'vitest/config';
export default defineConfig({
  test: {
    globals: true,
    include: ['packages/*/__tests__/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      all: true,
      include: ['packages/*/src/**'],
      thresholds: { lines: 90 },
    },
    environment: 'node',
  },
});
