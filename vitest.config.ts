import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],

    exclude: ['node_modules', 'dist', '**/examples/**'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/__tests__/**', '**/__mocks__/**', '**/__fixtures__/**', 'src/index.ts'],
    },

    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,

    clearMocks: true,
    mockReset: true,
    restoreMocks: true,
    unstubGlobals: true,
  },
});
