import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'prompt',
    root,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias: {
      '@hexgate/core': path.resolve(root, '../core/src/index.ts'),
      '@hexgate/prompt': path.resolve(root, './src/index.ts'),
    },
  },
});
