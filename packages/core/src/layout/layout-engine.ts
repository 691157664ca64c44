/**
 * Layout Engine
 *
 * Concentric-ring placement of endpoints around the graph centre. The ring
 * is picked by latency bucket; endpoints sharing a ring are spread at equal
 * angles from the top, with a small cyclic radial jitter. Every coordinate
 * is clamped inside the canvas minus the edge padding.
 */

import type { CanvasSize, Graph, LatencyBucket, LayoutConfig, Point } from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

export const EDGE_PADDING = 5;

/** Minimum usable half-extent (after padding) for adaptive radii */
export const ADAPTIVE_THRESHOLD = 20;

export const RING_RATIOS = { low: 0.3, medium: 0.5, high: 0.7 } as const;

/** Fallback radii; equal to the adaptive radii at the threshold */
export const DEFAULT_RADII = { low: 6, medium: 10, high: 14 } as const;

/** Angle of the first node in every ring (top of the canvas) */
export const REFERENCE_ANGLE = -Math.PI / 2;

export const JITTER_PERIOD = 3;

const MAX_JITTER = 2;

type Ring = 'low' | 'medium' | 'high';

// ============================================================================
// Ring Geometry
// ============================================================================

function isUsableDimension(value: number): boolean {
  return Number.isFinite(value) && value > 0;
}

export function computeLayout(width: number, height: number): LayoutConfig {
  const usable = isUsableDimension(width) && isUsableDimension(height);
  const available = usable ? Math.min(width, height) / 2 - EDGE_PADDING : -Infinity;

  if (available < ADAPTIVE_THRESHOLD) {
    return {
      ringLow: DEFAULT_RADII.low,
      ringMedium: DEFAULT_RADII.medium,
      ringHigh: DEFAULT_RADII.high,
      edgePadding: EDGE_PADDING,
      isAdaptive: false,
      width: usable ? width : 0,
      height: usable ? height : 0,
    };
  }

  return {
    ringLow: available * RING_RATIOS.low,
    ringMedium: available * RING_RATIOS.medium,
    ringHigh: available * RING_RATIOS.high,
    edgePadding: EDGE_PADDING,
    isAdaptive: true,
    width,
    height,
  };
}

export function layoutFor(canvas: CanvasSize): LayoutConfig {
  return computeLayout(canvas.width, canvas.height);
}

/**
 * Unknown latency sits on the neutral middle ring
 */
export function ringFor(bucket: LatencyBucket): Ring {
  return bucket === 'unknown' ? 'medium' : bucket;
}

function ringRadius(ring: Ring, layout: LayoutConfig): number {
  switch (ring) {
    case 'low':
      return layout.ringLow;
    case 'medium':
      return layout.ringMedium;
    case 'high':
      return layout.ringHigh;
  }
}

/**
 * Jitter amplitude, capped at a quarter of the narrowest ring gap so that
 * jittered rings never cross
 */
export function jitterAmplitude(layout: LayoutConfig): number {
  const gap = Math.min(layout.ringMedium - layout.ringLow, layout.ringHigh - layout.ringMedium);
  return Math.min(MAX_JITTER, Math.max(0, gap * 0.25));
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

// ============================================================================
// Placement
// ============================================================================

export function place(
  endpointIndex: number,
  totalInBucket: number,
  latencyBucket: LatencyBucket,
  layout: LayoutConfig
): Point {
  const total = Math.max(1, totalInBucket);
  const cx = layout.width / 2;
  const cy = layout.height / 2;

  const angle = (endpointIndex / total) * 2 * Math.PI + REFERENCE_ANGLE;
  const jitter = ((endpointIndex % JITTER_PERIOD) - 1) * jitterAmplitude(layout);
  const radius = ringRadius(ringFor(latencyBucket), layout) + jitter;

  const padding = layout.edgePadding;
  return {
    x: clamp(cx + radius * Math.cos(angle), padding, Math.max(padding, layout.width - padding)),
    y: clamp(cy + radius * Math.sin(angle), padding, Math.max(padding, layout.height - padding)),
  };
}

/**
 * Copy of the graph with every endpoint positioned. Endpoints are indexed
 * per ring in graph order, so unknown and medium share one spacing.
 */
export function layoutGraph(graph: Graph, layout: LayoutConfig): Graph {
  const totals = new Map<Ring, number>();
  for (const endpoint of graph.endpoints) {
    const ring = ringFor(endpoint.latency);
    totals.set(ring, (totals.get(ring) ?? 0) + 1);
  }

  const seen = new Map<Ring, number>();
  const endpoints = graph.endpoints.map((endpoint) => {
    const ring = ringFor(endpoint.latency);
    const index = seen.get(ring) ?? 0;
    seen.set(ring, index + 1);
    return { ...endpoint, position: place(index, totals.get(ring) ?? 1, endpoint.latency, layout) };
  });

  return { ...graph, endpoints };
}
