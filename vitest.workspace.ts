import { defineWorkspace } from 'vitest/config';

/**
 * Vitest workspace configuration for the sockgraph monorepo.
 * This enables running tests across all packages with a single command.
 */
export default defineWorkspace([
  // Core package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'sockgraph-core',
      root: './packages/core',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // CLI package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'sockgraph-cli',
      root: './packages/cli',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },

  // MCP package
  {
    extends: './vitest.config.ts',
    test: {
      name: 'sockgraph-mcp',
      root: './packages/mcp',
      include: ['src/**/*.{test,spec}.ts'],
    },
  },
]);
