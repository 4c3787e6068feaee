import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@stepyard/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    projects: [
      { extends: true, test: { name: 'core', include: ['packages/core/tests/**/*.test.ts'] } },
      { extends: true, test: { name: 'cli', include: ['packages/cli/tests/**/*.test.ts'] } },
    ],
    passWithNoTests: true,
  },
});
