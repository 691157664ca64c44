/**
 * Monitor Types
 *
 * Shared type definitions for the socket pipeline: raw connections,
 * classifications, the aggregated topology graph and layout output.
 * Everything except the correlation fields of a Connection is immutable.
 */

// ============================================================================
// Socket Types
// ============================================================================

export type Protocol = 'tcp' | 'udp';

export type AddressFamily = 'ipv4' | 'ipv6';

/**
 * Socket states as reported by the kernel socket tables
 */
export type ConnectionState =
  | 'established'
  | 'listen'
  | 'syn-sent'
  | 'syn-received'
  | 'fin-wait-1'
  | 'fin-wait-2'
  | 'time-wait'
  | 'close-wait'
  | 'last-ack'
  | 'closing'
  | 'closed';

export const CONNECTION_STATES: readonly ConnectionState[] = [
  'established',
  'listen',
  'syn-sent',
  'syn-received',
  'fin-wait-1',
  'fin-wait-2',
  'time-wait',
  'close-wait',
  'last-ack',
  'closing',
  'closed',
] as const;

export interface SocketAddress {
  readonly address: string;
  readonly port: number;
}

/**
 * One observed socket. Created fresh on every scan; only the process
 * fields are ever filled in afterwards (by the correlator).
 */
export interface Connection {
  readonly protocol: Protocol;
  readonly family: AddressFamily;
  readonly local: SocketAddress;
  /** Absent when the socket has no peer (unspecified address, port 0) */
  readonly remote?: SocketAddress;
  readonly state: ConnectionState;
  /** Kernel socket inode, used only for process correlation */
  readonly inode?: number;
  pid?: number;
  processName?: string;
  /** Epoch millis of the scan that produced this record */
  readonly observedAt: number;
}

export interface ProcessInfo {
  readonly pid: number;
  readonly name?: string;
}

// ============================================================================
// Classification Types
// ============================================================================

export type Locality = 'loopback' | 'private' | 'public' | 'listen-only';

export type LatencyBucket = 'low' | 'medium' | 'high' | 'unknown';

export type Severity = 'low' | 'medium' | 'high' | 'critical';

export interface LatencyThresholds {
  /** Samples strictly below this are low */
  readonly lowThresholdMs: number;
  /** Samples strictly above this are high */
  readonly highThresholdMs: number;
}

/**
 * Per-connection output of the classifier, index-aligned with the
 * connection list it was computed from
 */
export interface ConnectionClassification {
  readonly locality: Locality;
  readonly ruleIds: ReadonlySet<string>;
}

// ============================================================================
// Graph Types
// ============================================================================

export interface Point {
  readonly x: number;
  readonly y: number;
}

/**
 * All connections sharing one remote address
 */
export interface Endpoint {
  readonly address: string;
  readonly connectionCount: number;
  readonly dominantState: ConnectionState;
  readonly locality: Locality;
  readonly latency: LatencyBucket;
  readonly heavyTalker: boolean;
  /** Union of rule ids matched by any member, sorted */
  readonly ruleIds: readonly string[];
  /** Highest severity among matched rules, null when none matched */
  readonly severity: Severity | null;
  readonly pids: readonly number[];
  readonly remotePorts: readonly number[];
  /** Canvas position, null until the layout engine has run */
  readonly position: Point | null;
}

export type GraphCenter =
  | { readonly kind: 'host'; readonly label: string }
  | { readonly kind: 'process'; readonly pid: number; readonly label: string };

export interface GraphSummary {
  readonly totalConnections: number;
  readonly stateCounts: Readonly<Record<ConnectionState, number>>;
  readonly listenCount: number;
  /** Distinct remote endpoints before bounding */
  readonly endpointCount: number;
  /** Connections matching at least one rule */
  readonly suspiciousCount: number;
  readonly matchedTags: readonly string[];
  readonly maxSeverity: Severity | null;
}

export interface Graph {
  readonly center: GraphCenter;
  readonly endpoints: readonly Endpoint[];
  /** Endpoints left out of `endpoints` by the visible maximum */
  readonly dropped: number;
  readonly summary: GraphSummary;
  readonly generatedAt: number;
}

// ============================================================================
// Layout Types
// ============================================================================

export interface LayoutConfig {
  readonly ringLow: number;
  readonly ringMedium: number;
  readonly ringHigh: number;
  readonly edgePadding: number;
  /** False when the fixed fallback radii were used */
  readonly isAdaptive: boolean;
  readonly width: number;
  readonly height: number;
}

export interface CanvasSize {
  readonly width: number;
  readonly height: number;
}
