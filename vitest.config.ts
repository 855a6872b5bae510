import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

const packageSrc = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@reuseify/types': packageSrc('types'),
      '@reuseify/tools': packageSrc('tools'),
      '@reuseify/core': packageSrc('core'),
      '@reuseify/test-utils': packageSrc('test-utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 30000,
  },
});
