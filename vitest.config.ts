import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['apps/**/src/**/*.{test,spec}.ts', 'packages/**/src/**/*.{test,spec}.ts'],
    reporters: ['default'],
    // PGlite boots a wasm Postgres per test file; give it room on slow machines.
    testTimeout: 30_000,
    hookTimeout: 60_000,
    coverage: {
      provider: 'v8',
      include: ['apps/*/src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        '**/*.test.ts',
        '**/index.ts',
        '**/client.ts',
        '**/node_modules/**',
        'packages/types/**/*.ts',
        '**/coverage/**',
        '**/dist/**',
      ],
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      cleanOnRerun: true,
    },
  },
});
