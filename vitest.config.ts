import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    include: ['packages/*/src/**/__tests__/**/*.test.ts'],

    exclude: ['**/node_modules/**', '**/dist/**'],

    testTimeout: 30000,
    hookTimeout: 30000,

    watch: false,

    clearMocks: true,

    retry: 0,
  },
});
