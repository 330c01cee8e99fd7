// vitest.config.ts
// Tests live beside the sources of every workspace package

import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      // Workspace package, loaded from its sources so tests need no build
      'tailwise-core': fileURLToPath(new URL('./packages/tailwise-core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
});
