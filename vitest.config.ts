import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages run from their TypeScript sources, not their built dist
const packageSources = fileURLToPath(new URL('./packages/', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^@waypost\/([\w-]+)$/, replacement: `${packageSources}$1/src/index.ts` }],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
