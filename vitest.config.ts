import { defineConfig } from 'vitest/config';

/**
 * Root vitest configuration for every workspace package.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts', 'apps/**/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '**/node_modules/**'],
    testTimeout: 30000,
    reporters: ['default'],
  },
});
