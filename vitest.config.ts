import { defineConfig } from 'vitest/config';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const root = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    fileParallelism: false,
  },
  resolve: {
    alias: {
      'hostbridge-shared': resolve(root, 'packages/shared/src/index.ts'),
    },
  },
});
