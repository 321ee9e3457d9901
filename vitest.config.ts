import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const source = (pkg: string): string =>
  fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@daybook/contracts': source('contracts'),
      '@daybook/logger': source('logger'),
      '@daybook/clock': source('clock'),
      '@daybook/provider-wikipedia': source('provider-wikipedia'),
    },
  },
});
