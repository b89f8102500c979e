import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '*.config.ts'],
    },
  },
  resolve: {
    alias: {
      '@mdd/contracts': source('contracts'),
      '@mdd/logger': source('logger'),
      '@mdd/market-data-core': source('market-data-core'),
      '@mdd/provider-polygon': source('provider-polygon'),
      '@mdd/provider-twelvedata': source('provider-twelvedata'),
    },
  },
});
