import { defineConfig } from '@rstest/core';

export default defineConfig({
  source: {
    decorators: {
      version: 'legacy',
    },
  },
  testEnvironment: 'node',
  include: ['src/**/*.test.ts'],
  coverage: {
    include: ['src/**/*.ts'],
    exclude: [
      '**/*.test.ts',
      '**/index.ts',
      '**/*.interface.ts',
      'src/main.ts',
    ],
  },
});
