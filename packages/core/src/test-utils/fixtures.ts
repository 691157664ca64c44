/**
 * Connection fixtures for tests
 */

import { emptyStateCounts } from '../topology/aggregator.js';

import type {
  Connection,
  ConnectionState,
  Endpoint,
  Graph,
  LatencyBucket,
  Protocol,
} from '../types/index.js';

export interface ConnectionFixture {
  protocol?: Protocol;
  local?: [string, number];
  /** null for a socket without a peer */
  remote?: [string, number] | null;
  state?: ConnectionState;
  inode?: number;
  pid?: number;
  processName?: string;
  observedAt?: number;
}

export function makeConnection(fixture: ConnectionFixture = {}): Connection {
  const local = fixture.local ?? ['10.0.0.5', 40000];
  const remote: [string, number] | null = fixture.remote === undefined ? ['93.184.216.34', 443] : fixture.remote;
  const family = local[0].includes(':') ? 'ipv6' : 'ipv4';

  const connection: Connection = {
    protocol: fixture.protocol ?? 'tcp',
    family,
    local: { address: local[0], port: local[1] },
    ...(remote ? { remote: { address: remote[0], port: remote[1] } } : {}),
    state: fixture.state ?? 'established',
    ...(fixture.inode !== undefined ? { inode: fixture.inode } : {}),
    observedAt: fixture.observedAt ?? 1_000,
  };

  if (fixture.pid !== undefined) connection.pid = fixture.pid;
  if (fixture.processName !== undefined) connection.processName = fixture.processName;
  return connection;
}

export function makeEndpoint(address: string, latency: LatencyBucket = 'unknown', connectionCount = 1): Endpoint {
  return {
    address,
    connectionCount,
    dominantState: 'established',
    locality: 'public',
    latency,
    heavyTalker: false,
    ruleIds: [],
    severity: null,
    pids: [],
    remotePorts: [443],
    position: null,
  };
}

export function makeGraph(endpoints: Endpoint[]): Graph {
  return {
    center: { kind: 'host', label: 'test-host' },
    endpoints,
    dropped: 0,
    summary: {
      totalConnections: endpoints.reduce((sum, e) => sum + e.connectionCount, 0),
      stateCounts: emptyStateCounts(),
      listenCount: 0,
      endpointCount: endpoints.length,
      suspiciousCount: 0,
      matchedTags: [],
      maxSeverity: null,
    },
    generatedAt: 0,
  };
}

/**
 * `count` established connections from distinct local ports to one remote
 */
export function connectionsTo(address: string, count: number, fixture: ConnectionFixture = {}): Connection[] {
  return Array.from({ length: count }, (_, i) =>
    makeConnection({ ...fixture, local: ['10.0.0.5', 40000 + i], remote: [address, fixture.remote?.[1] ?? 443] })
  );
}
