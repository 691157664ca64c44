import { describe, it, expect } from 'vitest';

import {
  computeLayout,
  jitterAmplitude,
  layoutGraph,
  place,
  DEFAULT_RADII,
  EDGE_PADDING,
} from './layout-engine.js';
import { makeEndpoint, makeGraph } from '../test-utils/fixtures.js';
import type { LatencyBucket, LayoutConfig } from '../types/index.js';

const BUCKETS: LatencyBucket[] = ['low', 'medium', 'high', 'unknown'];

function radii(layout: LayoutConfig): [number, number, number] {
  return [layout.ringLow, layout.ringMedium, layout.ringHigh];
}

describe('computeLayout', () => {
  it('should scale radii from the available half-extent', () => {
    const layout = computeLayout(200, 100);

    expect(layout.isAdaptive).toBe(true);
    expect(layout.ringLow).toBeCloseTo(13.5);
    expect(layout.ringMedium).toBeCloseTo(22.5);
    expect(layout.ringHigh).toBeCloseTo(31.5);
  });

  it('should meet the fixed radii exactly at the threshold', () => {
    const layout = computeLayout(50, 50);

    expect(layout.isAdaptive).toBe(true);
    expect(radii(layout)).toEqual([6, 10, 14]);
  });

  it('should fall back to the fixed radii on small or degenerate canvases', () => {
    const canvases: Array<[number, number]> = [
      [49, 49],
      [10, 400],
      [0, 100],
      [-5, 30],
      [Number.NaN, 100],
      [Number.POSITIVE_INFINITY, 100],
    ];

    for (const [width, height] of canvases) {
      const layout = computeLayout(width, height);
      expect(layout.isAdaptive).toBe(false);
      expect(radii(layout)).toEqual([DEFAULT_RADII.low, DEFAULT_RADII.medium, DEFAULT_RADII.high]);
    }
  });

  it('should keep ratios constant and radii strictly increasing with size', () => {
    let previous: LayoutConfig | undefined;

    for (let size = 60; size <= 400; size += 20) {
      const layout = computeLayout(size, size + 37);

      expect(layout.ringLow).toBeLessThan(layout.ringMedium);
      expect(layout.ringMedium).toBeLessThan(layout.ringHigh);
      expect(layout.ringLow / layout.ringHigh).toBeCloseTo(0.3 / 0.7);
      expect(layout.ringMedium / layout.ringHigh).toBeCloseTo(0.5 / 0.7);

      if (previous) {
        expect(layout.ringLow).toBeGreaterThan(previous.ringLow);
        expect(layout.ringHigh).toBeGreaterThan(previous.ringHigh);
      }
      previous = layout;
    }
  });
});

describe('place', () => {
  const large = computeLayout(400, 400);

  it('should start each ring at the top', () => {
    const point = place(0, 4, 'low', large);

    // available 195 -> low ring 58.5, jitter -2 on the first slot
    expect(point.x).toBeCloseTo(200);
    expect(point.y).toBeCloseTo(143.5);
  });

  it('should place unknown latency on the medium ring', () => {
    expect(place(1, 3, 'unknown', large)).toEqual(place(1, 3, 'medium', large));
  });

  it('should space endpoints evenly around the ring', () => {
    const total = 8;
    const angles = Array.from({ length: total }, (_, i) => {
      const p = place(i, total, 'high', large);
      return Math.atan2(p.y - 200, p.x - 200);
    });

    for (let i = 1; i < total; i++) {
      const current = angles[i] ?? 0;
      const before = angles[i - 1] ?? 0;
      const step = (current - before + 2 * Math.PI) % (2 * Math.PI);
      expect(step).toBeCloseTo((2 * Math.PI) / total);
    }
  });

  it('should never let jitter cross ring boundaries', () => {
    for (const layout of [large, computeLayout(50, 50), computeLayout(0, 0)]) {
      const amplitude = jitterAmplitude(layout);
      expect(layout.ringLow + amplitude).toBeLessThan(layout.ringMedium - amplitude);
      expect(layout.ringMedium + amplitude).toBeLessThan(layout.ringHigh - amplitude);
    }
  });

  it('should keep every position inside the padded canvas', () => {
    const canvases: Array<[number, number]> = [
      [1, 1],
      [3, 200],
      [12, 12],
      [49, 49],
      [300, 40],
      [80, 24],
      [400, 400],
    ];

    for (const [width, height] of canvases) {
      const layout = computeLayout(width, height);
      const maxX = Math.max(EDGE_PADDING, layout.width - EDGE_PADDING);
      const maxY = Math.max(EDGE_PADDING, layout.height - EDGE_PADDING);

      for (const bucket of BUCKETS) {
        for (let total = 1; total <= 13; total++) {
          for (let index = 0; index < total; index++) {
            const { x, y } = place(index, total, bucket, layout);
            expect(x).toBeGreaterThanOrEqual(EDGE_PADDING);
            expect(x).toBeLessThanOrEqual(maxX);
            expect(y).toBeGreaterThanOrEqual(EDGE_PADDING);
            expect(y).toBeLessThanOrEqual(maxY);
          }
        }
      }
    }
  });
});

describe('layoutGraph', () => {
  it('should position every endpoint on a copy of the graph', () => {
    const layout = computeLayout(120, 80);
    const graph = makeGraph([
      makeEndpoint('10.0.0.1', 'low'),
      makeEndpoint('10.0.0.2', 'unknown'),
      makeEndpoint('10.0.0.3', 'medium'),
      makeEndpoint('10.0.0.4', 'high'),
    ]);

    const placed = layoutGraph(graph, layout);

    expect(graph.endpoints.every((e) => e.position === null)).toBe(true);
    expect(placed.endpoints.map((e) => e.position)).toEqual([
      place(0, 1, 'low', layout),
      place(0, 2, 'medium', layout),
      place(1, 2, 'medium', layout),
      place(0, 1, 'high', layout),
    ]);
  });
});
