import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@flotilla/core': pkg('core'),
      '@flotilla/adapters': pkg('adapters'),
      '@flotilla/runtime': pkg('runtime'),
      '@flotilla/api': pkg('api'),
      '@flotilla/testing': pkg('testing'),
      flotilla: pkg('flotilla'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
