import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    setupFiles: ['./packages/core/test/setup.ts'],
    testTimeout: 5000,
    benchmark: {
      include: ['benchmarks/**/*.bench.ts'],
    },
  },
});
