/**
 * Shared tool plumbing: what every handler is given, one collection pass,
 * and the JSON views of connections handed back to agents.
 */

import {
  buildGraph,
  classify,
  type Connection,
  type ConnectionSource,
  type GraphBuild,
  type Locality,
  type MonitorConfig,
  type RuleSet,
  type Snapshot,
  type SocketAddress,
  type Visibility,
} from 'sockgraph-core';

import type { ResponseBuilder } from '../infrastructure/index.js';

export interface ToolContext {
  source: ConnectionSource;
  ruleSet: RuleSet;
  config: Pick<MonitorConfig, 'maxVisibleEndpoints' | 'listCeiling' | 'latency'>;
  /** Centre label in host mode (default: the host name) */
  hostLabel?: string;
}

export interface ConnectionView {
  protocol: Connection['protocol'];
  local: string;
  remote: string | null;
  state: Connection['state'];
  pid: number | null;
  processName: string | null;
  locality: Locality;
}

export interface CollectOptions {
  focusPid?: number | null;
  maxVisible?: number;
}

export async function collect(
  context: ToolContext,
  options: CollectOptions = {}
): Promise<{ snapshot: Snapshot; build: GraphBuild }> {
  const snapshot = await context.source.collect();
  const build = buildGraph(snapshot.connections, {
    ruleSet: context.ruleSet,
    focusPid: options.focusPid ?? null,
    maxVisible: options.maxVisible ?? context.config.maxVisibleEndpoints,
    latencyThresholds: context.config.latency,
    ...(context.hostLabel !== undefined ? { hostLabel: context.hostLabel } : {}),
  });
  return { snapshot, build };
}

export function formatSocket(socket: SocketAddress): string {
  return socket.address.includes(':') ? `[${socket.address}]:${socket.port}` : `${socket.address}:${socket.port}`;
}

export function toConnectionView(connection: Connection): ConnectionView {
  return {
    protocol: connection.protocol,
    local: formatSocket(connection.local),
    remote: connection.remote ? formatSocket(connection.remote) : null,
    state: connection.state,
    pid: connection.pid ?? null,
    processName: connection.processName ?? null,
    locality: classify(connection),
  };
}

/**
 * Surface degraded visibility as a response warning
 */
export function warnOnVisibility<T>(builder: ResponseBuilder<T>, visibility: Visibility): void {
  if (visibility === 'none') {
    builder.addWarning('No socket tables were readable: insufficient access or unsupported platform.');
  } else if (visibility === 'limited') {
    builder.addWarning('Some processes could not be inspected; process attribution is partial.');
  }
}
