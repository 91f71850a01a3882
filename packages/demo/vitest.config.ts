import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig({
  resolve: {
    alias: {
      '@swarmgrid/core': path.resolve(__dirname, '../core/src/index.ts'),
      '@swarmgrid/agent': path.resolve(__dirname, '../agent/src/index.ts'),
    },
  },
});
