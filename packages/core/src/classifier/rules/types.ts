/**
 * Suspicion rule model
 *
 * A rule is a tagged predicate tree over one connection plus a little
 * context about its neighbours (how many connections share its remote
 * address). Rules are data: authored in JSON, validated on load,
 * evaluated without reflection.
 */

import type { ConnectionState, Locality, Protocol, Severity } from '../../types/index.js';

export interface PortRange {
  /** Inclusive lower bound */
  readonly min?: number;
  /** Inclusive upper bound */
  readonly max?: number;
}

export interface Repetition {
  /** Minimum connections to the same remote address, this one included */
  readonly min: number;
  /** Count only connections in these states; every state when absent */
  readonly state?: readonly ConnectionState[];
}

export type Predicate =
  | { readonly all: readonly Predicate[] }
  | { readonly any: readonly Predicate[] }
  | { readonly not: Predicate }
  | { readonly state: { readonly in: readonly ConnectionState[] } }
  | { readonly protocol: { readonly is: Protocol } }
  | { readonly remotePort: PortRange }
  | { readonly localPort: PortRange }
  | { readonly locality: { readonly in: readonly Locality[] } }
  | { readonly repetition: Repetition }
  | { readonly process: { readonly known: boolean } };

export interface Rule {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly severity: Severity;
  readonly tags: readonly string[];
  readonly match: Predicate;
}

export interface RuleSet {
  readonly version: number;
  readonly rules: readonly Rule[];
}

/**
 * Facts about the surrounding connection set that single-connection
 * predicates cannot see
 */
export interface RuleContext {
  /** Remote address -> number of connections to it */
  readonly repetitions: ReadonlyMap<string, number>;
  /** Remote address -> state -> number of connections to it in that state */
  readonly repetitionsByState: ReadonlyMap<string, ReadonlyMap<ConnectionState, number>>;
}

export interface ConnectionAnalysis {
  readonly ruleIds: ReadonlySet<string>;
  /** Highest severity among matches, null when nothing matched */
  readonly severity: Severity | null;
  /** Union of tags of matched rules, sorted */
  readonly tags: readonly string[];
}

export const EMPTY_RULE_SET: RuleSet = { version: 1, rules: [] };
