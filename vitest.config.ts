import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const coreSource = (file: string) => fileURLToPath(new URL(`./packages/core/src/${file}`, import.meta.url));

export default defineConfig({
  resolve: {
    // Workspace packages run from their TypeScript sources
    alias: [
      { find: /^sockgraph-core\/testing$/, replacement: coreSource('test-utils/fixtures.ts') },
      { find: /^sockgraph-core$/, replacement: coreSource('index.ts') },
    ],
  },
  test: {
    environment: 'node',
    testTimeout: 10_000,
  },
});
