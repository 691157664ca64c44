/**
 * Topology Aggregator
 *
 * Groups connections by remote address into Endpoints, ranks them by
 * volume, flags heavy talkers and bounds the visible set. Summary counters
 * always cover the whole input, not just what survives bounding.
 */

import { classify } from '../classifier/locality.js';
import { classifyLatency, DEFAULT_LATENCY_THRESHOLDS } from '../classifier/latency.js';
import { buildRuleContext, evaluateSuspicion, severityOf } from '../classifier/rules/rule-evaluator.js';
import { EMPTY_RULE_SET, type RuleContext, type RuleSet } from '../classifier/rules/types.js';
import type {
  Connection,
  ConnectionClassification,
  ConnectionState,
  Endpoint,
  Graph,
  GraphCenter,
  GraphSummary,
  LatencyThresholds,
} from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

/** Visible endpoint maximum for the dense graph view */
export const MAX_VISIBLE_ENDPOINTS = 12;

/** Larger ceiling used by list views */
export const LIST_CEILING = 64;

export const HEAVY_TALKER_RANK = 5;

/**
 * Display severity of a state; higher wins a tie on observation time
 */
export const STATE_SEVERITY: Readonly<Record<ConnectionState, number>> = {
  established: 0,
  listen: 1,
  'syn-sent': 2,
  'syn-received': 2,
  'fin-wait-1': 3,
  'fin-wait-2': 3,
  'time-wait': 3,
  'close-wait': 3,
  'last-ack': 3,
  closed: 4,
  closing: 5,
};

export const HOST_CENTER: GraphCenter = { kind: 'host', label: 'localhost' };

// ============================================================================
// Types
// ============================================================================

export interface AggregateOptions {
  /** Visible endpoint maximum (default MAX_VISIBLE_ENDPOINTS) */
  maxVisible?: number;
  center?: GraphCenter;
  /** Remote address -> round-trip sample in ms */
  latencySamples?: ReadonlyMap<string, number>;
  latencyThresholds?: LatencyThresholds;
  /** Rule set the classifications were computed with; used for severity and tags */
  ruleSet?: RuleSet;
  now?: () => number;
}

interface EndpointGroup {
  address: string;
  members: Connection[];
  classifications: ConnectionClassification[];
}

// ============================================================================
// Classification
// ============================================================================

/**
 * Locality and matched rules for every connection, index-aligned with the
 * input. Repetition counts are taken over the same connection set.
 */
export function classifyConnections(
  connections: readonly Connection[],
  ruleSet: RuleSet = EMPTY_RULE_SET,
  context: RuleContext = buildRuleContext(connections)
): ConnectionClassification[] {
  return connections.map((connection) => ({
    locality: classify(connection),
    ruleIds: evaluateSuspicion(connection, ruleSet, context),
  }));
}

// ============================================================================
// Aggregation helpers
// ============================================================================

export function dominantState(members: readonly Connection[]): ConnectionState {
  let best: Connection | undefined;
  for (const member of members) {
    if (
      !best ||
      member.observedAt > best.observedAt ||
      (member.observedAt === best.observedAt && STATE_SEVERITY[member.state] > STATE_SEVERITY[best.state])
    ) {
      best = member;
    }
  }
  return best?.state ?? 'closed';
}

function groupByRemote(
  connections: readonly Connection[],
  classifications: readonly ConnectionClassification[]
): EndpointGroup[] {
  const groups = new Map<string, EndpointGroup>();

  connections.forEach((connection, index) => {
    if (connection.state === 'listen' || !connection.remote) return;

    const address = connection.remote.address;
    let group = groups.get(address);
    if (!group) {
      group = { address, members: [], classifications: [] };
      groups.set(address, group);
    }
    group.members.push(connection);
    group.classifications.push(
      classifications[index] ?? { locality: classify(connection), ruleIds: new Set<string>() }
    );
  });

  return [...groups.values()];
}

function rankGroups(groups: EndpointGroup[]): EndpointGroup[] {
  return groups.sort((a, b) => {
    const byCount = b.members.length - a.members.length;
    if (byCount !== 0) return byCount;
    return a.address < b.address ? -1 : a.address > b.address ? 1 : 0;
  });
}

/**
 * Heavy-talker flags for a ranked list: with at least five endpoints,
 * everything at or above the fifth-highest count; otherwise the top one
 */
export function heavyTalkerFlags(rankedCounts: readonly number[]): boolean[] {
  if (rankedCounts.length >= HEAVY_TALKER_RANK) {
    const threshold = rankedCounts[HEAVY_TALKER_RANK - 1] ?? 0;
    return rankedCounts.map((count) => count >= threshold);
  }
  return rankedCounts.map((_, index) => index === 0);
}

function uniqueSorted(values: Iterable<number>): number[] {
  return [...new Set(values)].sort((a, b) => a - b);
}

export function emptyStateCounts(): Record<ConnectionState, number> {
  return {
    established: 0,
    listen: 0,
    'syn-sent': 0,
    'syn-received': 0,
    'fin-wait-1': 0,
    'fin-wait-2': 0,
    'time-wait': 0,
    'close-wait': 0,
    'last-ack': 0,
    closing: 0,
    closed: 0,
  };
}

function summarize(
  connections: readonly Connection[],
  classifications: readonly ConnectionClassification[],
  endpointCount: number,
  ruleSet: RuleSet
): GraphSummary {
  const stateCounts = emptyStateCounts();
  for (const connection of connections) {
    stateCounts[connection.state]++;
  }

  const matchedIds = new Set<string>();
  let suspiciousCount = 0;
  for (const classification of classifications) {
    if (classification.ruleIds.size === 0) continue;
    suspiciousCount++;
    classification.ruleIds.forEach((id) => matchedIds.add(id));
  }

  const matchedTags = new Set(
    ruleSet.rules.filter((rule) => matchedIds.has(rule.id)).flatMap((rule) => rule.tags)
  );

  return {
    totalConnections: connections.length,
    stateCounts,
    listenCount: stateCounts.listen,
    endpointCount,
    suspiciousCount,
    matchedTags: [...matchedTags].sort(),
    maxSeverity: severityOf(matchedIds, ruleSet),
  };
}

// ============================================================================
// Aggregation
// ============================================================================

export function aggregate(
  connections: readonly Connection[],
  classifications: readonly ConnectionClassification[],
  options: AggregateOptions = {}
): Graph {
  const maxVisible = Math.max(0, options.maxVisible ?? MAX_VISIBLE_ENDPOINTS);
  const ruleSet = options.ruleSet ?? EMPTY_RULE_SET;
  const thresholds = options.latencyThresholds ?? DEFAULT_LATENCY_THRESHOLDS;

  const ranked = rankGroups(groupByRemote(connections, classifications));
  const heavy = heavyTalkerFlags(ranked.map((group) => group.members.length));

  const endpoints: Endpoint[] = ranked.slice(0, maxVisible).map((group, index) => {
    const ruleIds = new Set(group.classifications.flatMap((c) => [...c.ruleIds]));
    return {
      address: group.address,
      connectionCount: group.members.length,
      dominantState: dominantState(group.members),
      locality: group.classifications[0]?.locality ?? 'public',
      latency: classifyLatency(options.latencySamples?.get(group.address), thresholds),
      heavyTalker: heavy[index] ?? false,
      ruleIds: [...ruleIds].sort(),
      severity: severityOf(ruleIds, ruleSet),
      pids: uniqueSorted(group.members.flatMap((m) => (m.pid === undefined ? [] : [m.pid]))),
      remotePorts: uniqueSorted(group.members.flatMap((m) => (m.remote ? [m.remote.port] : []))),
      position: null,
    };
  });

  return {
    center: options.center ?? HOST_CENTER,
    endpoints,
    dropped: ranked.length - endpoints.length,
    summary: summarize(connections, classifications, ranked.length, ruleSet),
    generatedAt: (options.now ?? Date.now)(),
  };
}
