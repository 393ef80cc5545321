import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const resolveFromRoot = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    isolate: true,
    include: ['packages/*/__tests__/**/*.test.ts', 'tests/**/*.test.ts'],
  },
  resolve: {
    alias: {
      // Use source files directly for tests (no build required)
      '@clawharbor/core': resolveFromRoot('./packages/core/src/index.ts'),
      '@clawharbor/test-utils': resolveFromRoot('./packages/test-utils/src/index.ts'),
    },
  },
});
