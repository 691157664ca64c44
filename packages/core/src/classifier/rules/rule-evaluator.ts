/**
 * Rule Evaluator
 *
 * Pure evaluation of predicate trees against one connection. The
 * evaluator never invents heuristics; with an empty rule set nothing is
 * ever suspicious.
 */

import { classify } from '../locality.js';

import type { Connection, ConnectionState, Severity } from '../../types/index.js';
import type {
  ConnectionAnalysis,
  PortRange,
  Predicate,
  Repetition,
  Rule,
  RuleContext,
  RuleSet,
} from './types.js';

// ============================================================================
// Severity
// ============================================================================

export const SEVERITY_RANK: Readonly<Record<Severity, number>> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function compareSeverity(a: Severity, b: Severity): number {
  return SEVERITY_RANK[a] - SEVERITY_RANK[b];
}

export function maxSeverity(severities: Iterable<Severity>): Severity | null {
  let max: Severity | null = null;
  for (const severity of severities) {
    if (max === null || compareSeverity(severity, max) > 0) {
      max = severity;
    }
  }
  return max;
}

// ============================================================================
// Context
// ============================================================================

export const EMPTY_RULE_CONTEXT: RuleContext = { repetitions: new Map(), repetitionsByState: new Map() };

/**
 * Count connections per remote address, in total and per state
 */
export function buildRuleContext(connections: readonly Connection[]): RuleContext {
  const repetitions = new Map<string, number>();
  const repetitionsByState = new Map<string, Map<ConnectionState, number>>();
  for (const connection of connections) {
    if (!connection.remote) continue;
    const address = connection.remote.address;
    repetitions.set(address, (repetitions.get(address) ?? 0) + 1);

    let byState = repetitionsByState.get(address);
    if (!byState) {
      byState = new Map();
      repetitionsByState.set(address, byState);
    }
    byState.set(connection.state, (byState.get(connection.state) ?? 0) + 1);
  }
  return { repetitions, repetitionsByState };
}

function repetitionOf(connection: Connection, repetition: Repetition, context: RuleContext): number {
  if (!connection.remote) return 0;
  const address = connection.remote.address;

  let count: number;
  if (repetition.state === undefined) {
    count = context.repetitions.get(address) ?? 0;
  } else {
    // a connection outside the counted states never repeats
    if (!repetition.state.includes(connection.state)) return 0;
    const byState = context.repetitionsByState.get(address);
    count = repetition.state.reduce((sum, state) => sum + (byState?.get(state) ?? 0), 0);
  }
  // a connection always repeats at least itself
  return Math.max(1, count);
}

// ============================================================================
// Evaluation
// ============================================================================

function inRange(port: number, range: PortRange): boolean {
  if (range.min !== undefined && port < range.min) return false;
  if (range.max !== undefined && port > range.max) return false;
  return true;
}

export function evaluatePredicate(predicate: Predicate, connection: Connection, context: RuleContext): boolean {
  if ('all' in predicate) {
    return predicate.all.every((child) => evaluatePredicate(child, connection, context));
  }
  if ('any' in predicate) {
    return predicate.any.some((child) => evaluatePredicate(child, connection, context));
  }
  if ('not' in predicate) {
    return !evaluatePredicate(predicate.not, connection, context);
  }
  if ('state' in predicate) {
    return predicate.state.in.includes(connection.state);
  }
  if ('protocol' in predicate) {
    return connection.protocol === predicate.protocol.is;
  }
  if ('remotePort' in predicate) {
    return connection.remote !== undefined && inRange(connection.remote.port, predicate.remotePort);
  }
  if ('localPort' in predicate) {
    return inRange(connection.local.port, predicate.localPort);
  }
  if ('locality' in predicate) {
    return predicate.locality.in.includes(classify(connection));
  }
  if ('repetition' in predicate) {
    return repetitionOf(connection, predicate.repetition, context) >= predicate.repetition.min;
  }
  return (connection.pid !== undefined) === predicate.process.known;
}

export function ruleMatches(rule: Rule, connection: Connection, context: RuleContext = EMPTY_RULE_CONTEXT): boolean {
  return evaluatePredicate(rule.match, connection, context);
}

/**
 * Identifiers of every rule the connection matches
 */
export function evaluateSuspicion(
  connection: Connection,
  ruleSet: RuleSet,
  context: RuleContext = EMPTY_RULE_CONTEXT
): Set<string> {
  const matched = new Set<string>();
  for (const rule of ruleSet.rules) {
    if (ruleMatches(rule, connection, context)) {
      matched.add(rule.id);
    }
  }
  return matched;
}

/**
 * Matched rule ids plus the display summary: highest severity and the
 * union of tags
 */
export function analyzeConnection(
  connection: Connection,
  ruleSet: RuleSet,
  context: RuleContext = EMPTY_RULE_CONTEXT
): ConnectionAnalysis {
  const ruleIds = evaluateSuspicion(connection, ruleSet, context);
  const matchedRules = ruleSet.rules.filter((rule) => ruleIds.has(rule.id));
  const tags = new Set(matchedRules.flatMap((rule) => rule.tags));

  return {
    ruleIds,
    severity: maxSeverity(matchedRules.map((rule) => rule.severity)),
    tags: [...tags].sort(),
  };
}

/**
 * Highest severity among a set of rule ids of one rule set
 */
export function severityOf(ruleIds: Iterable<string>, ruleSet: RuleSet): Severity | null {
  const wanted = new Set(ruleIds);
  return maxSeverity(ruleSet.rules.filter((rule) => wanted.has(rule.id)).map((rule) => rule.severity));
}
