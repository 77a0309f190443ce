import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/__tests__/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/__tests__/**', 'src/index.ts'],
    },

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    watch: false,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
