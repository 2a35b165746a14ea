import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const source = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  // Workspace packages export their built dist; tests run against the sources
  resolve: {
    alias: {
      '@routewright/runtime': source('./packages/runtime/src/index.ts'),
      '@routewright/compiler': source('./packages/compiler/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts', 'packages/*/tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        statements: 85,
        lines: 85,
        functions: 85,
        branches: 75,
      },
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/*.d.ts',
        '**/index.ts',
        '**/*.config.ts',
        'packages/compiler/src/types.ts', // type-only module (no runtime statements)
        'packages/runtime/src/host.ts', // host contract, types only
      ],
    },
    testTimeout: 10000,
  },
});
