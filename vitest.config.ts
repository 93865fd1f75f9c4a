import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@pagewright/common': fromRoot('./shared/common/index.ts'),
      '@pagewright/contracts': fromRoot('./packages/layout-engine/contracts/src/index.ts'),
      '@pagewright/style-engine': fromRoot('./packages/layout-engine/style-engine/src/index.ts'),
      '@pagewright/measuring-text': fromRoot('./packages/layout-engine/measuring/text/src/index.ts'),
      '@pagewright/layout-engine': fromRoot('./packages/layout-engine/layout-engine/src/index.ts'),
      '@pagewright/painter-pdf': fromRoot('./packages/layout-engine/painters/pdf/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['shared/**/*.test.ts', 'packages/**/*.test.ts'],
  },
});
