import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  {
    extends: './vitest.config.ts',
    test: {
      name: 'linalg',
      root: './packages/linalg',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
  {
    extends: './vitest.config.ts',
    test: {
      name: 'network',
      root: './packages/network',
      include: ['tests/**/*.test.ts'],
      environment: 'node',
    },
  },
]);
