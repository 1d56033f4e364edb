// Vitest configuration

import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@repairgate/shared-types': path.resolve(rootDir, 'shared-types/index.ts'),
    },
  },
  test: {
    environment: 'node',

    testTimeout: 10000,

    // keep test output readable; the logger honours LOG_LEVEL
    env: {
      LOG_LEVEL: 'silent',
    },

    include: ['engine/src/**/*.{test,spec}.ts'],

    exclude: ['node_modules/', 'dist/'],
  },
});
