import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test files
    include: ['__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    // Environment
    environment: 'node',

    // Don't watch by default
    watch: false,

    // Coverage
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/main.ts', 'src/index.ts'],
      thresholds: {
        statements: 85,
        branches: 80,
        functions: 85,
        lines: 85,
      },
    },

    globals: true,

    // Setup files
    setupFiles: ['__tests__/utils/test-setup.ts'],
  },
});
