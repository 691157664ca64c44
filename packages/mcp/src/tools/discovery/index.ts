/**
 * Discovery tools: the shape of the host's network activity
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';

export { handleTopology, TopologyArgsSchema } from './topology.js';
export type { TopologyData } from './topology.js';
export { groupByProcess, handleProcesses, ProcessesArgsSchema } from './processes.js';
export type { ProcessesData, ProcessSockets } from './processes.js';

export const DISCOVERY_TOOLS: Tool[] = [
  {
    name: 'sockgraph_topology',
    description:
      'Remote endpoints of the host (or of one process) ranked by connection count, with dominant state, locality, latency bucket, heavy-talker flag and suspicion severity. Start here.',
    inputSchema: {
      type: 'object',
      properties: {
        pid: { type: 'number', description: 'Restrict to sockets owned by this process' },
        limit: { type: 'number', description: 'Maximum endpoints to return (default 12)' },
      },
      required: [],
    },
  },
  {
    name: 'sockgraph_processes',
    description: 'Processes that own sockets, with connection counts, listening ports and distinct remote endpoints.',
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Case-insensitive substring of the process name' },
        limit: { type: 'number', description: 'Maximum processes to return' },
      },
      required: [],
    },
  },
];
