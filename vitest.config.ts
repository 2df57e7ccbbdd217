import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts', 'packages/*/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    alias: {
      'gke-cluster-sdk': fileURLToPath(new URL('./packages/gke-sdk/src/index.ts', import.meta.url)),
    },
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/index.ts', '**/types.ts'],
      reporter: ['text', 'lcov'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
