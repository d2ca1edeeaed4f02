import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', 'tools/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 80,
        statements: 85,
      },
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        '**/__tests__/**',
        '**/__mocks__/**',
        '**/*.test.ts',
        '**/index.ts',
        '**/env.ts',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@rxstock/types': fromRoot('./packages/types/src/index.ts'),
      '@rxstock/core': fromRoot('./packages/core/src/index.ts'),
      '@rxstock/domain': fromRoot('./packages/domain/src/index.ts'),
      '@rxstock/integrations': fromRoot('./packages/integrations/src/index.ts'),
      '@rxstock/infrastructure': fromRoot('./packages/infrastructure/src/index.ts'),
      '@rxstock/infra': fromRoot('./packages/infra/src/index.ts'),
    },
  },
});
