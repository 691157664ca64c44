#!/usr/bin/env node
/**
 * sockgraph MCP Server Entry Point
 *
 * Usage:
 *   sockgraph-mcp                         # Serve over stdio
 *   sockgraph-mcp --proc-root /host/proc  # Read another process filesystem
 *   sockgraph-mcp --rules my-rules.json   # Use a custom rule file
 *   sockgraph-mcp --verbose               # Debug logging on stderr
 *
 * MCP Config (add to mcp.json):
 * {
 *   "mcpServers": {
 *     "sockgraph": {
 *       "command": "sockgraph-mcp"
 *     }
 *   }
 * }
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { createSockgraphMCPServer } from '../server.js';

function flagValue(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  const procRoot = flagValue(args, '--proc-root');
  const rulesPath = flagValue(args, '--rules');
  const configPath = flagValue(args, '--config');

  const { server, logger } = await createSockgraphMCPServer({
    verbose: args.includes('--verbose') || args.includes('-v'),
    ...(procRoot !== undefined ? { procRoot } : {}),
    ...(rulesPath !== undefined ? { rulesPath } : {}),
    ...(configPath !== undefined ? { configPath } : {}),
  });

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.debug('Listening on stdio');

  const shutdown = (): void => {
    server
      .close()
      .catch((error: unknown) => logger.error('Error while closing the server', error))
      .finally(() => process.exit(0));
  };

  // Handle graceful shutdown
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  console.error('[sockgraph-mcp] Failed to start:', error);
  process.exit(1);
});
