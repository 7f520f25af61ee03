import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared/schema': fromRoot('./packages/shared/schema/index.ts'),
      '@shared': fromRoot('./packages/shared'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['server/**/*.test.ts', 'packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
});
