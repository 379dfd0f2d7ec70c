import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@gymledger/shared': fileURLToPath(new URL('../shared/src', import.meta.url)),
    },
  },
  test: {
    name: 'db',
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
  },
});
