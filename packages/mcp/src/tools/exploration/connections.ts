/**
 * sockgraph_connections - Correlated connection list
 *
 * Every socket of the last scan with its owning process and locality,
 * optionally filtered by state, protocol, pid or locality.
 */

import { z } from 'zod';
import { ConnectionStateSchema, LocalitySchema } from 'sockgraph-core';

import { createResponseBuilder, parseArgs, type ToolContent } from '../../infrastructure/index.js';
import { collect, toConnectionView, warnOnVisibility, type ConnectionView, type ToolContext } from '../context.js';

export const ConnectionsArgsSchema = z
  .object({
    state: ConnectionStateSchema.optional(),
    protocol: z.enum(['tcp', 'udp']).optional(),
    pid: z.number().int().positive().optional(),
    locality: LocalitySchema.optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict();

export interface ConnectionsData {
  total: number;
  connections: ConnectionView[];
}

export async function handleConnections(context: ToolContext, args: unknown): Promise<ToolContent> {
  const input = parseArgs(ConnectionsArgsSchema, args);
  const builder = createResponseBuilder<ConnectionsData>();

  const { snapshot, build } = await collect(context, { focusPid: input.pid ?? null });
  const matching = build.connections
    .map(toConnectionView)
    .filter(
      (view) =>
        (input.state === undefined || view.state === input.state) &&
        (input.protocol === undefined || view.protocol === input.protocol) &&
        (input.locality === undefined || view.locality === input.locality)
    );
  const limit = input.limit ?? context.config.listCeiling;
  const connections = matching.slice(0, limit);

  warnOnVisibility(builder, snapshot.visibility);

  return builder
    .withSummary(
      `${matching.length} of ${snapshot.connections.length} connection(s) match` +
        (input.pid !== undefined ? ` for pid ${input.pid}` : '')
    )
    .withData({ total: matching.length, connections })
    .withTruncation(connections.length, matching.length)
    .withRelatedTools(['sockgraph_suspicious', 'sockgraph_topology'])
    .buildContent();
}
