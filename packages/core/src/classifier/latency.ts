/**
 * Latency buckets drive ring placement only. An absent sample is
 * 'unknown', never folded into low or high.
 */

import type { LatencyBucket, LatencyThresholds } from '../types/index.js';

export const DEFAULT_LATENCY_THRESHOLDS: LatencyThresholds = {
  lowThresholdMs: 50,
  highThresholdMs: 200,
};

export function classifyLatency(
  sampleMs: number | null | undefined,
  thresholds: LatencyThresholds = DEFAULT_LATENCY_THRESHOLDS
): LatencyBucket {
  if (sampleMs === null || sampleMs === undefined || !Number.isFinite(sampleMs) || sampleMs < 0) {
    return 'unknown';
  }
  if (sampleMs < thresholds.lowThresholdMs) return 'low';
  if (sampleMs > thresholds.highThresholdMs) return 'high';
  return 'medium';
}
