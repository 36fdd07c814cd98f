import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@efscript/logger': fileURLToPath(new URL('../logger/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'cli',
    environment: 'node',
    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
  },
});
