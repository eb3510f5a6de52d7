import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@toolsmith/common': path.resolve(__dirname, 'packages/common/src/index.ts'),
      '@toolsmith/forge': path.resolve(__dirname, 'packages/forge/src/index.ts'),
      '@toolsmith/library': path.resolve(__dirname, 'packages/library/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/test/**/*.test.ts', 'apps/*/src/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20000,
  },
});
