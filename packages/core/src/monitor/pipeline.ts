/**
 * Pipeline
 *
 * Two halves: a ConnectionSource that produces one correlated snapshot
 * (scan, then correlate), and buildGraph, which turns a snapshot into a
 * Graph (focus filter, classify, aggregate). The monitor store, the CLI
 * and the MCP server all go through here.
 */

import * as os from 'node:os';

import { silentLogger, type Logger } from '../infrastructure/logger.js';
import { scanSockets, type ScanResult } from '../scanner/socket-scanner.js';
import { correlate, type CorrelationStats } from '../procfs/process-correlator.js';
import { aggregate, classifyConnections, MAX_VISIBLE_ENDPOINTS } from '../topology/aggregator.js';
import { DEFAULT_LATENCY_THRESHOLDS } from '../classifier/latency.js';
import { EMPTY_RULE_SET, type RuleSet } from '../classifier/rules/types.js';

import type { MonitorConfig } from '../config/monitor-config.js';
import type {
  Connection,
  ConnectionClassification,
  Graph,
  GraphCenter,
  LatencyThresholds,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What the last scan could see. 'none' means no socket table was
 * readable; 'limited' means some processes could not be inspected.
 */
export type Visibility = 'ok' | 'limited' | 'none';

export interface Snapshot {
  connections: Connection[];
  scan: Pick<ScanResult, 'tablesRead' | 'unreadableTables' | 'skippedRecords'>;
  correlation: CorrelationStats;
  visibility: Visibility;
  collectedAt: number;
}

export interface ConnectionSource {
  collect(): Promise<Snapshot>;
}

export type SourceConfig = Pick<MonitorConfig, 'procRoot' | 'protocols' | 'includeIpv6' | 'correlationBudgetMs'>;

export interface SourceOverrides {
  platform?: NodeJS.Platform;
  now?: () => number;
}

export interface BuildGraphOptions {
  ruleSet?: RuleSet;
  /** Restrict to connections owned by this pid */
  focusPid?: number | null;
  maxVisible?: number;
  latencySamples?: ReadonlyMap<string, number>;
  latencyThresholds?: LatencyThresholds;
  /** Centre label in host mode (default: the host name) */
  hostLabel?: string;
  now?: () => number;
}

export interface GraphBuild {
  graph: Graph;
  /** Connections the graph was built from, after the focus filter */
  connections: Connection[];
  classifications: ConnectionClassification[];
}

// ============================================================================
// Sources
// ============================================================================

export function deriveVisibility(scan: Pick<ScanResult, 'tablesRead'>, correlation: CorrelationStats): Visibility {
  if (scan.tablesRead.length === 0) return 'none';
  if (correlation.processesSkipped > 0 || correlation.budgetExceeded) return 'limited';
  return 'ok';
}

/**
 * Live source over the kernel interfaces
 */
export function createProcfsSource(
  config: SourceConfig,
  logger: Logger = silentLogger,
  overrides: SourceOverrides = {}
): ConnectionSource {
  return {
    async collect(): Promise<Snapshot> {
      const scan = await scanSockets({
        procRoot: config.procRoot,
        protocols: config.protocols,
        includeIpv6: config.includeIpv6,
        logger,
        ...(overrides.now ? { now: overrides.now } : {}),
      });

      const correlation = await correlate(scan.connections, {
        procRoot: config.procRoot,
        logger,
        ...(config.correlationBudgetMs !== undefined ? { budgetMs: config.correlationBudgetMs } : {}),
        ...(overrides.platform ? { platform: overrides.platform } : {}),
      });

      logger.debug(
        `Collected ${scan.connections.length} connection(s), ${correlation.matched} attributed to processes`
      );

      return {
        connections: scan.connections,
        scan: {
          tablesRead: scan.tablesRead,
          unreadableTables: scan.unreadableTables,
          skippedRecords: scan.skippedRecords,
        },
        correlation,
        visibility: deriveVisibility(scan, correlation),
        collectedAt: scan.observedAt,
      };
    },
  };
}

/**
 * Source replaying a fixed connection list, e.g. a capture
 */
export function createStaticSource(connections: readonly Connection[], now: () => number = Date.now): ConnectionSource {
  return {
    async collect(): Promise<Snapshot> {
      return {
        connections: connections.map((connection) => ({ ...connection })),
        scan: { tablesRead: ['static'], unreadableTables: [], skippedRecords: 0 },
        correlation: {
          processesScanned: 0,
          processesSkipped: 0,
          socketsIndexed: 0,
          matched: connections.filter((c) => c.pid !== undefined).length,
          budgetExceeded: false,
        },
        visibility: 'ok',
        collectedAt: now(),
      };
    },
  };
}

// ============================================================================
// Graph
// ============================================================================

function centerFor(connections: readonly Connection[], focusPid: number | null, hostLabel: string): GraphCenter {
  if (focusPid === null) {
    return { kind: 'host', label: hostLabel };
  }
  const name = connections.find((c) => c.processName !== undefined)?.processName;
  return { kind: 'process', pid: focusPid, label: name ?? `pid ${focusPid}` };
}

export function filterByPid(connections: readonly Connection[], pid: number | null | undefined): Connection[] {
  if (pid === null || pid === undefined) return [...connections];
  return connections.filter((connection) => connection.pid === pid);
}

export function buildGraph(connections: readonly Connection[], options: BuildGraphOptions = {}): GraphBuild {
  const ruleSet = options.ruleSet ?? EMPTY_RULE_SET;
  const focusPid = options.focusPid ?? null;

  const visible = filterByPid(connections, focusPid);
  const classifications = classifyConnections(visible, ruleSet);

  const graph = aggregate(visible, classifications, {
    ruleSet,
    center: centerFor(visible, focusPid, options.hostLabel ?? os.hostname()),
    maxVisible: options.maxVisible ?? MAX_VISIBLE_ENDPOINTS,
    latencyThresholds: options.latencyThresholds ?? DEFAULT_LATENCY_THRESHOLDS,
    ...(options.latencySamples ? { latencySamples: options.latencySamples } : {}),
    ...(options.now ? { now: options.now } : {}),
  });

  return { graph, connections: visible, classifications };
}
