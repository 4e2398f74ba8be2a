import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    // Environment
    environment: 'node',
    globals: true,

    // Test files
    include: ['src/**/*.test.ts', 'scripts/**/*.test.ts', 'test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Timeout
    testTimeout: 10000,

    // Setup
    setupFiles: ['./test/setup.ts'],
  },

  // Path aliases
  resolve: {
    alias: {
      '@rankline/shared-types': path.resolve(__dirname, '../../packages/shared-types/src'),
    },
  },
});
