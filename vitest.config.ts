import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@publishkit/plugin-contracts': fromRoot('./packages/plugin-contracts/src/index.ts'),
      '@publishkit/plugin-runtime': fromRoot('./packages/plugin-runtime/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
  },
});
