import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@wfgraph/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    projects: [
      { extends: true, test: { name: 'core', root: './packages/core' } },
      { extends: true, test: { name: 'cli', root: './packages/cli' } },
    ],
    passWithNoTests: true,
  },
});
