/**
 * Refresh cadence and animation constants
 */

import type { Connection, ConnectionState } from '../types/index.js';

export interface IntervalBounds {
  readonly defaultMs: number;
  readonly minMs: number;
  readonly maxMs: number;
  readonly stepMs: number;
}

/** UI tick: drives animation counters and re-layout */
export const UI_INTERVAL: IntervalBounds = { defaultMs: 100, minMs: 50, maxMs: 1000, stepMs: 50 };

/** Data scan: drives the scan -> correlate -> aggregate pipeline */
export const SCAN_INTERVAL: IntervalBounds = { defaultMs: 2000, minMs: 500, maxMs: 30000, stepMs: 500 };

export const PULSE_INCREMENT = 0.05;
export const BLINK_PERIOD_MS = 500;
export const ACTIVITY_HISTORY_LENGTH = 60;
/** How long an interval change stays highlighted */
export const CHANGE_HIGHLIGHT_MS = 500;

/** -1 shortens the interval (faster), 1 lengthens it */
export type IntervalDirection = -1 | 1;

export function clampInterval(valueMs: number, bounds: IntervalBounds): number {
  if (!Number.isFinite(valueMs)) return bounds.defaultMs;
  return Math.min(bounds.maxMs, Math.max(bounds.minMs, Math.round(valueMs)));
}

export function stepInterval(currentMs: number, direction: IntervalDirection, bounds: IntervalBounds): number {
  return clampInterval(currentMs + direction * bounds.stepMs, bounds);
}

/**
 * Next pulse phase in [0, 1). Rounded to avoid float drift across
 * thousands of ticks.
 */
export function advancePulse(phase: number): number {
  const next = Math.round((phase + PULSE_INCREMENT) * 1e6) / 1e6;
  return next >= 1 ? 0 : next;
}

const TRANSITIONAL_STATES: ReadonlySet<ConnectionState> = new Set<ConnectionState>([
  'syn-sent',
  'syn-received',
  'fin-wait-1',
  'fin-wait-2',
  'closing',
]);

/**
 * Activity score in 5..100 for one scan: 5 per established (max 50),
 * 2 per listener (max 20), 10 per connection mid-handshake or mid-close
 * (max 30), on top of a base of 10 (5 when there is nothing at all)
 */
export function activityScore(connections: readonly Connection[]): number {
  let established = 0;
  let listening = 0;
  let transitional = 0;

  for (const connection of connections) {
    if (connection.state === 'established') established++;
    else if (connection.state === 'listen') listening++;
    else if (TRANSITIONAL_STATES.has(connection.state)) transitional++;
  }

  const base = connections.length === 0 ? 5 : 10;
  const score =
    base + Math.min(50, established * 5) + Math.min(20, listening * 2) + Math.min(30, transitional * 10);

  return Math.min(100, Math.max(5, score));
}

export function recentlyChanged(lastChangeAt: number | null, at: number): boolean {
  return lastChangeAt !== null && at - lastChangeAt < CHANGE_HIGHLIGHT_MS;
}

export function pushBounded<T>(history: readonly T[], value: T, limit: number): T[] {
  const next = [...history, value];
  return next.length > limit ? next.slice(next.length - limit) : next;
}
