import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/test/**',
        '**/*.test.*',
        '**/dist/**',
        '**/coverage/**',
        '**/*.config.*',
      ]
    }
  },
});
