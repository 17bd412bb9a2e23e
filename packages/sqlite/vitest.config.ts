import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@pagerdata/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'sqlite',
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
