import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@gymledger/shared': fileURLToPath(new URL('../../shared/src', import.meta.url)),
      '@gymledger/db': fileURLToPath(new URL('../../db/src', import.meta.url)),
      '@gymledger/core': fileURLToPath(new URL('../../core/src', import.meta.url)),
      '@gymledger/module-memberships': fileURLToPath(new URL('../memberships/src', import.meta.url)),
    },
  },
  test: {
    name: 'attendance',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
