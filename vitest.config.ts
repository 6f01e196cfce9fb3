import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const packagePath = (relative: string): string =>
  fileURLToPath(new URL(`./packages/${relative}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@annotext/types': packagePath('types/src/index.ts'),
      '@annotext/core': packagePath('core/src/index.ts'),
      '@annotext/stage-client': packagePath('stage-client/src/index.ts'),
      '@annotext/test-utils': packagePath('test-utils/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10000,
  },
});
