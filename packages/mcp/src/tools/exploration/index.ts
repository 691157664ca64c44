/**
 * Exploration tools: individual connections
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export { ConnectionsArgsSchema, handleConnections } from './connections.js';
export type { ConnectionsData } from './connections.js';
export { handleSuspicious, SuspiciousArgsSchema } from './suspicious.js';
export type { SuspiciousConnection, SuspiciousData } from './suspicious.js';
export { FALLBACK_STEPS, investigationSteps, matchReasons } from './investigation.js';
export type { MatchReason } from './investigation.js';

export const EXPLORATION_TOOLS: Tool[] = [
  {
    name: 'sockgraph_connections',
    description: 'Correlated connection list: protocol, local and remote socket, state, owning process and locality.',
    inputSchema: {
      type: 'object',
      properties: {
        state: { type: 'string', description: 'Connection state, e.g. established, listen, time-wait' },
        protocol: { type: 'string', enum: ['tcp', 'udp'] },
        pid: { type: 'number', description: 'Only sockets owned by this process' },
        locality: { type: 'string', enum: ['loopback', 'private', 'public', 'listen-only'] },
        limit: { type: 'number', description: 'Maximum connections to return' },
      },
      required: [],
    },
  },
  {
    name: 'sockgraph_suspicious',
    description: 'Connections matching at least one suspicion rule, with rule ids, highest severity, tags, per-rule reasons and investigation steps, most severe first.',
    inputSchema: {
      type: 'object',
      properties: {
        minSeverity: { type: 'string', enum: ['low', 'medium', 'high', 'critical'] },
        limit: { type: 'number', description: 'Maximum connections to return' },
      },
      required: [],
    },
  },
];
