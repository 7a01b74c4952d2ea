import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@pkgview/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    env: {
      DEBUG_MODE: 'false',
    },
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**', '**/dist/**'],
  },
});
