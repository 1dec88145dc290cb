import { defineConfig } from 'vitest/config';

/**
 * Shared Vitest Configuration
 *
 * Extended by every project in vitest.workspace.ts. Workspace packages
 * resolve to their TypeScript sources through their package.json exports,
 * so tests need no build first.
 */
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },
});
