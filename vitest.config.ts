import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'apps/*/tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent'
    }
  },
  resolve: {
    alias: {
      '@ragkit/core': path.resolve(root, 'packages/rag-core/src'),
      '@ragkit/engine': path.resolve(root, 'packages/rag-engine/src'),
      '@ragkit/test-utils': path.resolve(root, 'packages/rag-test-utils/src')
    }
  }
});
