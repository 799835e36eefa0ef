import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = fileURLToPath(new URL('..', import.meta.url));

export default defineConfig({
  root,
  test: {
    watch: false,
    include: ['tests/**/*.test.ts'],
    testTimeout: 20_000,
    benchmark: {
      include: ['tests/**/*.benchmark.ts'],
    },
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts'],
      thresholds: {
        statements: 90,
        branches: 85,
        functions: 90,
        lines: 90,
      },
      clean: true,
      reportsDirectory: 'coverage',
    },
  },
});
