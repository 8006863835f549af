import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: [
        'node_modules/**',
        'dist/**',
        '**/*.d.ts',
        '**/index.ts',
        '**/tests/**',
      ],
      thresholds: {
        lines: 80,
        functions: 75,
        branches: 70,
        statements: 80,
      },
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    isolate: true,
    pool: 'threads',
  },
  resolve: {
    alias: {
      '@perceptron/linalg': fileURLToPath(new URL('./packages/linalg/src/index.ts', import.meta.url)),
      '@perceptron/network': fileURLToPath(new URL('./packages/network/src/index.ts', import.meta.url)),
    },
  },
});
