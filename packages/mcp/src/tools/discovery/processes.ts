/**
 * sockgraph_processes - Processes that own sockets
 */

import { z } from 'zod';
import type { Connection, ConnectionState } from 'sockgraph-core';

import { createResponseBuilder, parseArgs, type ToolContent } from '../../infrastructure/index.js';
import { collect, warnOnVisibility, type ToolContext } from '../context.js';

export const ProcessesArgsSchema = z
  .object({
    /** Case-insensitive substring of the process name */
    name: z.string().min(1).optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict();

export interface ProcessSockets {
  pid: number;
  name: string | null;
  connections: number;
  listeningPorts: number[];
  remoteEndpoints: number;
  states: Partial<Record<ConnectionState, number>>;
}

export interface ProcessesData {
  total: number;
  unattributed: number;
  processes: ProcessSockets[];
}

/**
 * Group attributed connections by pid, busiest first
 */
export function groupByProcess(connections: readonly Connection[]): ProcessSockets[] {
  const groups = new Map<number, Connection[]>();
  for (const connection of connections) {
    if (connection.pid === undefined) continue;
    const members = groups.get(connection.pid);
    if (members) members.push(connection);
    else groups.set(connection.pid, [connection]);
  }

  const processes = [...groups.entries()].map(([pid, members]): ProcessSockets => {
    const states: Partial<Record<ConnectionState, number>> = {};
    for (const member of members) {
      states[member.state] = (states[member.state] ?? 0) + 1;
    }
    const listening = new Set(members.filter((m) => m.state === 'listen').map((m) => m.local.port));
    const remotes = new Set(members.flatMap((m) => (m.remote ? [m.remote.address] : [])));

    return {
      pid,
      name: members.find((m) => m.processName !== undefined)?.processName ?? null,
      connections: members.length,
      listeningPorts: [...listening].sort((a, b) => a - b),
      remoteEndpoints: remotes.size,
      states,
    };
  });

  return processes.sort((a, b) => b.connections - a.connections || a.pid - b.pid);
}

export async function handleProcesses(context: ToolContext, args: unknown): Promise<ToolContent> {
  const input = parseArgs(ProcessesArgsSchema, args);
  const builder = createResponseBuilder<ProcessesData>();

  const { snapshot } = await collect(context);
  const needle = input.name?.toLowerCase();
  const matching = groupByProcess(snapshot.connections).filter(
    (entry) => needle === undefined || (entry.name ?? '').toLowerCase().includes(needle)
  );
  const unattributed = snapshot.connections.filter((c) => c.pid === undefined).length;
  const processes = matching.slice(0, input.limit ?? context.config.listCeiling);

  warnOnVisibility(builder, snapshot.visibility);
  if (unattributed > 0) {
    builder.addWarning(`${unattributed} connection(s) could not be attributed to a process.`);
  }

  return builder
    .withSummary(
      `${matching.length} process(es) own sockets` + (input.name !== undefined ? ` matching '${input.name}'` : '')
    )
    .withData({ total: matching.length, unattributed, processes })
    .withTruncation(processes.length, matching.length)
    .withRelatedTools(['sockgraph_topology', 'sockgraph_connections'])
    .buildContent();
}
