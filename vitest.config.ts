import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  // Resolve workspace packages to their TypeScript sources so tests never
  // depend on a prior build.
  resolve: {
    alias: [
      {
        find: '@quarry/core',
        replacement: path.resolve(root, 'packages/core/src/index.ts'),
      },
    ],
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
