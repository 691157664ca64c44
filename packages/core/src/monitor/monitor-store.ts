/**
 * Monitor Store
 *
 * Zustand store owning the refresh/animation state machine: the single
 * mutable owner of RefreshState and the published Graph. A renderer
 * subscribes and reads; an input layer calls the commands; a loop calls
 * tick().
 *
 * Phases: idle -> scanning -> laying-out -> rendered. tick() is a no-op
 * while a pass is in flight, and a Graph is published only once a pass
 * has completed.
 */

import { createStore } from 'zustand/vanilla';
import { subscribeWithSelector } from 'zustand/middleware';

import { silentLogger, type Logger } from '../infrastructure/logger.js';
import { layoutFor, layoutGraph } from '../layout/layout-engine.js';
import { EMPTY_RULE_SET, type RuleSet } from '../classifier/rules/types.js';
import { buildGraph, type ConnectionSource, type Snapshot, type Visibility } from './pipeline.js';
import {
  ACTIVITY_HISTORY_LENGTH,
  BLINK_PERIOD_MS,
  SCAN_INTERVAL,
  UI_INTERVAL,
  activityScore,
  advancePulse,
  clampInterval,
  pushBounded,
  stepInterval,
  type IntervalDirection,
} from './refresh-config.js';

import type {
  CanvasSize,
  Connection,
  Graph,
  LatencyThresholds,
  LayoutConfig,
} from '../types/index.js';

// ============================================================================
// Store State Interface
// ============================================================================

export type MonitorPhase = 'idle' | 'scanning' | 'laying-out' | 'rendered';

export type ViewMode = 'host' | 'process';

export interface RefreshState {
  uiIntervalMs: number;
  scanIntervalMs: number;
  lastScanAt: number | null;
  lastTickAt: number | null;
  lastBlinkAt: number;
  /** Cyclic 0..1 */
  pulsePhase: number;
  blink: boolean;
  /** Index into visibleConnections */
  selectedIndex: number | null;
  mode: ViewMode;
  focusedPid: number | null;
  lastIntervalChangeAt: number | null;
}

export interface MonitorStoreState {
  phase: MonitorPhase;
  refresh: RefreshState;

  /** Last snapshot, unfiltered */
  connections: Connection[];
  /** Last snapshot after the focus filter */
  visibleConnections: Connection[];
  /** Aggregated graph before layout */
  baseGraph: Graph | null;
  /** Published graph, positions filled in */
  graph: Graph | null;

  canvas: CanvasSize;
  layout: LayoutConfig;
  /** Canvas the published layout was computed for */
  layoutCanvas: CanvasSize | null;

  visibility: Visibility;
  lastSnapshot: Snapshot | null;
  activityHistory: number[];

  rescanRequested: boolean;
  stopped: boolean;
}

// ============================================================================
// Store Actions Interface
// ============================================================================

export interface MonitorStoreActions {
  /** One cooperative step of the loop */
  tick: () => Promise<void>;

  selectNext: () => void;
  selectPrevious: () => void;
  /** Enter or leave process focus; false when focus is not possible */
  toggleFocus: () => boolean;

  adjustUiInterval: (direction: IntervalDirection) => void;
  adjustScanInterval: (direction: IntervalDirection) => void;
  requestRescan: () => void;
  stop: () => void;
  setCanvas: (canvas: CanvasSize) => void;
}

export type MonitorStore = MonitorStoreState & MonitorStoreActions;

export interface MonitorStoreOptions {
  source: ConnectionSource;
  ruleSet?: RuleSet;
  canvas?: CanvasSize;
  uiIntervalMs?: number;
  scanIntervalMs?: number;
  maxVisible?: number;
  latencyThresholds?: LatencyThresholds;
  latencySamples?: ReadonlyMap<string, number>;
  hostLabel?: string;
  logger?: Logger;
  now?: () => number;
}

// ============================================================================
// Helpers
// ============================================================================

function sameCanvas(a: CanvasSize | null, b: CanvasSize): boolean {
  return a !== null && a.width === b.width && a.height === b.height;
}

function clampSelection(index: number | null, length: number): number | null {
  if (index === null || length === 0) return null;
  return Math.min(index, length - 1);
}

// ============================================================================
// Store Implementation
// ============================================================================

const DEFAULT_CANVAS: CanvasSize = { width: 80, height: 24 };

export function createMonitorStore(options: MonitorStoreOptions) {
  const now = options.now ?? Date.now;
  const logger = options.logger ?? silentLogger;
  const ruleSet = options.ruleSet ?? EMPTY_RULE_SET;
  const canvas = options.canvas ?? DEFAULT_CANVAS;

  return createStore<MonitorStore>()(
    subscribeWithSelector((set, get) => {
      const rebuild = (connections: readonly Connection[], focusPid: number | null) =>
        buildGraph(connections, {
          ruleSet,
          focusPid,
          ...(options.maxVisible !== undefined ? { maxVisible: options.maxVisible } : {}),
          ...(options.latencyThresholds ? { latencyThresholds: options.latencyThresholds } : {}),
          ...(options.latencySamples ? { latencySamples: options.latencySamples } : {}),
          ...(options.hostLabel !== undefined ? { hostLabel: options.hostLabel } : {}),
          now,
        });

      /**
       * Rebuild and re-publish from the last snapshot without rescanning
       */
      const republish = (focusPid: number | null): void => {
        const { connections, layout } = get();
        const build = rebuild(connections, focusPid);
        set({
          visibleConnections: build.connections,
          baseGraph: build.graph,
          graph: layoutGraph(build.graph, layout),
        });
      };

      return {
        phase: 'idle',
        refresh: {
          uiIntervalMs: clampInterval(options.uiIntervalMs ?? UI_INTERVAL.defaultMs, UI_INTERVAL),
          scanIntervalMs: clampInterval(options.scanIntervalMs ?? SCAN_INTERVAL.defaultMs, SCAN_INTERVAL),
          lastScanAt: null,
          lastTickAt: null,
          lastBlinkAt: now(),
          pulsePhase: 0,
          blink: true,
          selectedIndex: null,
          mode: 'host',
          focusedPid: null,
          lastIntervalChangeAt: null,
        },
        connections: [],
        visibleConnections: [],
        baseGraph: null,
        graph: null,
        canvas,
        layout: layoutFor(canvas),
        layoutCanvas: null,
        visibility: 'ok',
        lastSnapshot: null,
        activityHistory: [],
        rescanRequested: false,
        stopped: false,

        tick: async () => {
          const state = get();
          if (state.stopped || state.phase === 'scanning' || state.phase === 'laying-out') {
            return;
          }

          const tickAt = now();
          const blinkDue = tickAt - state.refresh.lastBlinkAt >= BLINK_PERIOD_MS;
          set({
            refresh: {
              ...state.refresh,
              pulsePhase: advancePulse(state.refresh.pulsePhase),
              blink: blinkDue ? !state.refresh.blink : state.refresh.blink,
              lastBlinkAt: blinkDue ? tickAt : state.refresh.lastBlinkAt,
              lastTickAt: tickAt,
            },
          });

          const scanDue =
            state.rescanRequested ||
            state.refresh.lastScanAt === null ||
            tickAt - state.refresh.lastScanAt >= state.refresh.scanIntervalMs;

          let snapshot: Snapshot | null = null;
          if (scanDue) {
            set({ phase: 'scanning', rescanRequested: false });
            try {
              snapshot = await options.source.collect();
            } catch (error) {
              logger.warn('Connection scan failed; keeping the previous graph', error);
            }
          }

          const current = get();
          const canvasChanged = !sameCanvas(current.layoutCanvas, current.canvas);
          if (!snapshot && !canvasChanged) {
            set({
              phase: 'rendered',
              ...(scanDue ? { refresh: { ...current.refresh, lastScanAt: tickAt } } : {}),
            });
            return;
          }

          set({ phase: 'laying-out' });

          const connections = snapshot ? snapshot.connections : current.connections;
          const build = snapshot
            ? rebuild(connections, current.refresh.focusedPid)
            : { graph: current.baseGraph, connections: current.visibleConnections };
          const layoutCanvas = current.canvas;
          const layout = layoutFor(layoutCanvas);

          set({
            phase: 'rendered',
            connections,
            visibleConnections: build.connections,
            baseGraph: build.graph,
            graph: build.graph ? layoutGraph(build.graph, layout) : null,
            layout,
            layoutCanvas,
            ...(snapshot
              ? {
                  lastSnapshot: snapshot,
                  visibility: snapshot.visibility,
                  activityHistory: pushBounded(
                    current.activityHistory,
                    activityScore(build.connections),
                    ACTIVITY_HISTORY_LENGTH
                  ),
                }
              : {}),
            refresh: {
              ...current.refresh,
              ...(scanDue ? { lastScanAt: tickAt } : {}),
              selectedIndex: clampSelection(current.refresh.selectedIndex, build.connections.length),
            },
          });
        },

        selectNext: () => {
          const { refresh, visibleConnections } = get();
          if (visibleConnections.length === 0) {
            set({ refresh: { ...refresh, selectedIndex: null } });
            return;
          }
          const next =
            refresh.selectedIndex === null
              ? 0
              : Math.min(refresh.selectedIndex + 1, visibleConnections.length - 1);
          set({ refresh: { ...refresh, selectedIndex: next } });
        },

        selectPrevious: () => {
          const { refresh, visibleConnections } = get();
          if (visibleConnections.length === 0) {
            set({ refresh: { ...refresh, selectedIndex: null } });
            return;
          }
          const previous =
            refresh.selectedIndex === null ? visibleConnections.length - 1 : Math.max(refresh.selectedIndex - 1, 0);
          set({ refresh: { ...refresh, selectedIndex: previous } });
        },

        toggleFocus: () => {
          const { refresh, visibleConnections } = get();

          if (refresh.mode === 'process') {
            set({ refresh: { ...refresh, mode: 'host', focusedPid: null, selectedIndex: null } });
            republish(null);
            return true;
          }

          const selected = refresh.selectedIndex === null ? undefined : visibleConnections[refresh.selectedIndex];
          if (selected?.pid === undefined) {
            return false;
          }

          set({ refresh: { ...refresh, mode: 'process', focusedPid: selected.pid, selectedIndex: null } });
          republish(selected.pid);
          return true;
        },

        adjustUiInterval: (direction) => {
          const { refresh } = get();
          set({
            refresh: {
              ...refresh,
              uiIntervalMs: stepInterval(refresh.uiIntervalMs, direction, UI_INTERVAL),
              lastIntervalChangeAt: now(),
            },
          });
        },

        adjustScanInterval: (direction) => {
          const { refresh } = get();
          set({
            refresh: {
              ...refresh,
              scanIntervalMs: stepInterval(refresh.scanIntervalMs, direction, SCAN_INTERVAL),
              lastIntervalChangeAt: now(),
            },
          });
        },

        requestRescan: () => set({ rescanRequested: true }),

        stop: () => set({ stopped: true }),

        setCanvas: (next) => set({ canvas: { width: next.width, height: next.height } }),
      };
    })
  );
}

export type MonitorStoreApi = ReturnType<typeof createMonitorStore>;

// ============================================================================
// Selectors
// ============================================================================

export const selectSelectedConnection = (state: MonitorStoreState): Connection | null => {
  const index = state.refresh.selectedIndex;
  if (index === null) return null;
  return state.visibleConnections[index] ?? null;
};

export const selectIsBusy = (state: MonitorStoreState): boolean =>
  state.phase === 'scanning' || state.phase === 'laying-out';
