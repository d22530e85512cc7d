import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 30000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@tasktrack/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  esbuild: {
    target: 'node20',
  },
});
