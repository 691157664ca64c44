/**
 * sockgraph MCP Server
 *
 * Exposes connection snapshots, suspicion results and the endpoint
 * topology as MCP tools for AI agents.
 */

// Primary Server Export
export { createMCPServer, createSockgraphMCPServer, SERVER_VERSION } from './server.js';
export type { SockgraphMCPConfig } from './server.js';

// Tools
export * from './tools/index.js';

// Infrastructure
export * from './infrastructure/index.js';
