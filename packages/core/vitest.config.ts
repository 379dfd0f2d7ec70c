import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@gymledger/shared': fileURLToPath(new URL('../shared/src', import.meta.url)),
      '@gymledger/db': fileURLToPath(new URL('../db/src', import.meta.url)),
    },
  },
  test: {
    name: 'core',
    globals: true,
    environment: 'node',
    testTimeout: 10_000,
    include: ['src/**/*.test.ts'],
  },
});
