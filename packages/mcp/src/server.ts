/**
 * sockgraph MCP Server Implementation
 *
 * Exposes connection snapshots to AI agents as MCP tools. Every tool call
 * runs a fresh scan; nothing is cached between calls.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import {
  createLogger,
  createProcfsSource,
  loadMonitorConfig,
  loadRuleSet,
  type Logger,
} from 'sockgraph-core';

import { ALL_TOOLS, callTool } from './tools/index.js';

import type { ToolContext } from './tools/index.js';

export const SERVER_VERSION = '0.1.0';

export interface SockgraphMCPConfig {
  /** Directory holding .sockgraph/config.json (default: cwd) */
  cwd?: string;
  configPath?: string;
  procRoot?: string;
  rulesPath?: string;
  verbose?: boolean;
}

/**
 * Server over an already-assembled tool context
 */
export function createMCPServer(context: ToolContext): Server {
  const server = new Server({ name: 'sockgraph', version: SERVER_VERSION }, { capabilities: { tools: {} } });

  // List available tools
  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: ALL_TOOLS,
  }));

  // Handle tool calls
  server.setRequestHandler(CallToolRequestSchema, async (request) =>
    callTool(context, request.params.name, request.params.arguments)
  );

  return server;
}

/**
 * Load configuration and rules, then build a server over the live source
 */
export async function createSockgraphMCPServer(
  config: SockgraphMCPConfig = {}
): Promise<{ server: Server; logger: Logger }> {
  const loaded = await loadMonitorConfig({
    ...(config.cwd !== undefined ? { cwd: config.cwd } : {}),
    ...(config.configPath !== undefined ? { configPath: config.configPath } : {}),
  });
  const monitorConfig = {
    ...loaded.config,
    ...(config.procRoot !== undefined ? { procRoot: config.procRoot } : {}),
  };

  const logger = createLogger({ level: config.verbose ? 'debug' : monitorConfig.logLevel, name: 'sockgraph-mcp' });
  for (const diagnostic of loaded.diagnostics) {
    logger.warn(`${diagnostic.source}: ${diagnostic.message}`);
  }

  const { ruleSet } = await loadRuleSet(config.rulesPath ?? monitorConfig.rulesPath, logger);
  logger.info(`Serving ${ALL_TOOLS.length} tools with ${ruleSet.rules.length} rule(s) over ${monitorConfig.procRoot}`);

  const server = createMCPServer({
    source: createProcfsSource(monitorConfig, logger),
    ruleSet,
    config: monitorConfig,
  });
  return { server, logger };
}
