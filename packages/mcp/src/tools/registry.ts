/**
 * Tool Registry
 *
 * Tool definitions and handler routing.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { Errors } from 'sockgraph-core';

import { DISCOVERY_TOOLS, handleProcesses, handleTopology } from './discovery/index.js';
import { EXPLORATION_TOOLS, handleConnections, handleSuspicious } from './exploration/index.js';
import { handleError, type ToolContent } from '../infrastructure/index.js';

import type { ToolContext } from './context.js';

/**
 * All registered tools; discovery first
 */
export const ALL_TOOLS: Tool[] = [...DISCOVERY_TOOLS, ...EXPLORATION_TOOLS];

type ToolHandler = (context: ToolContext, args: unknown) => Promise<ToolContent>;

const HANDLERS: Readonly<Record<string, ToolHandler>> = {
  sockgraph_topology: handleTopology,
  sockgraph_processes: handleProcesses,
  sockgraph_connections: handleConnections,
  sockgraph_suspicious: handleSuspicious,
};

export function hasTool(name: string): boolean {
  return ALL_TOOLS.some((tool) => tool.name === name);
}

/**
 * Route a call; every failure comes back as an isError result
 */
export async function callTool(context: ToolContext, name: string, args: unknown): Promise<ToolContent> {
  try {
    const handler = Object.hasOwn(HANDLERS, name) ? HANDLERS[name] : undefined;
    if (!handler) {
      throw Errors.invalidArgument('name', `unknown tool '${name}'`, `Use one of: ${ALL_TOOLS.map((t) => t.name).join(', ')}`);
    }
    return await handler(context, args);
  } catch (error) {
    return handleError(error);
  }
}
