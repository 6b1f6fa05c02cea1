import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@retitler/shared': fileURLToPath(new URL('./shared', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['worker/src/**/__tests__/**/*.test.ts', 'shared/**/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
