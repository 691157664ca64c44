/**
 * sockgraph_topology - Aggregated endpoint graph
 *
 * The bounded, ranked endpoint list the live view draws, for the whole
 * host or a single process. Positions are laid out on a nominal terminal
 * canvas, returned alongside them.
 */

import { z } from 'zod';
import {
  Errors,
  layoutFor,
  layoutGraph,
  type CanvasSize,
  type Endpoint,
  type GraphCenter,
  type GraphSummary,
} from 'sockgraph-core';

import { createResponseBuilder, parseArgs, type ToolContent } from '../../infrastructure/index.js';
import { collect, warnOnVisibility, type ToolContext } from '../context.js';

export const TopologyArgsSchema = z
  .object({
    pid: z.number().int().positive().optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict();

const NOMINAL_CANVAS: CanvasSize = { width: 80, height: 24 };

export interface TopologyData {
  center: GraphCenter;
  canvas: CanvasSize;
  endpoints: readonly Endpoint[];
  dropped: number;
  summary: GraphSummary;
}

export async function handleTopology(context: ToolContext, args: unknown): Promise<ToolContent> {
  const input = parseArgs(TopologyArgsSchema, args);
  const builder = createResponseBuilder<TopologyData>();

  const { snapshot, build } = await collect(context, {
    focusPid: input.pid ?? null,
    maxVisible: input.limit ?? context.config.maxVisibleEndpoints,
  });
  if (input.pid !== undefined && build.connections.length === 0) {
    throw Errors.processNotFound(input.pid);
  }

  const graph = layoutGraph(build.graph, layoutFor(NOMINAL_CANVAS));
  warnOnVisibility(builder, snapshot.visibility);
  if (graph.dropped > 0) {
    builder.addNextAction(`${graph.dropped} endpoint(s) were left out; pass a larger limit to include them`);
  }

  return builder
    .withSummary(
      `${graph.summary.totalConnections} connection(s) to ${graph.summary.endpointCount} endpoint(s) from ` +
        `${graph.center.kind === 'host' ? 'host' : 'process'} ${graph.center.label}`
    )
    .withData({
      center: graph.center,
      canvas: NOMINAL_CANVAS,
      endpoints: graph.endpoints,
      dropped: graph.dropped,
      summary: graph.summary,
    })
    .withRelatedTools(['sockgraph_suspicious', 'sockgraph_processes'])
    .buildContent();
}
