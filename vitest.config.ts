import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
    // PGlite boots a WebAssembly Postgres per test file
    testTimeout: 30_000,
    hookTimeout: 30_000,
  },
});
