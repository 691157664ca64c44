/**
 * sockgraph-core - Process-aware connection monitoring
 *
 * This package provides the monitor pipeline:
 * - Scanner: kernel socket tables -> Connection records
 * - Correlator: socket inode -> owning process
 * - Classifier: locality, latency buckets and suspicion rules
 * - Topology: per-endpoint aggregation into a bounded Graph
 * - Layout: concentric-ring placement on a canvas
 * - Monitor: the refresh/animation state machine driving all of the above
 */

// Export version
export const VERSION = '0.1.0';

// Type exports (main public API)
export * from './types/index.js';

// Infrastructure
export {
  ConsoleLogger,
  createLogger,
  isLogLevel,
  resolveLogLevel,
  silentLogger,
  LOG_LEVELS,
} from './infrastructure/logger.js';
export type { Logger, LogLevel, LogSink, LoggerOptions } from './infrastructure/logger.js';

export { SockgraphError, SockgraphErrorCode, Errors, describeFsError } from './errors/sockgraph-error.js';
export type { Diagnostic, RecoveryHint, SockgraphErrorDetails } from './errors/sockgraph-error.js';

// Scanner exports
export {
  TCP_STATE_CODES,
  formatIPv6Groups,
  parseHexIPv4,
  parseHexIPv6,
  parseSocketAddress,
  parseSocketLine,
  parseSocketTable,
} from './scanner/proc-net-parser.js';
export type { ParsedTable, SocketTableSource } from './scanner/proc-net-parser.js';
export { DEFAULT_PROC_ROOT, scan, scanSockets } from './scanner/socket-scanner.js';
export type { ScanOptions, ScanResult } from './scanner/socket-scanner.js';

// Correlator exports
export { buildInodeIndex, correlate } from './procfs/process-correlator.js';
export type { CorrelateOptions, CorrelationStats, InodeIndex } from './procfs/process-correlator.js';

// Classifier exports
export { classify, classifyAddress } from './classifier/locality.js';
export type { AddressScope } from './classifier/locality.js';
export { classifyLatency, DEFAULT_LATENCY_THRESHOLDS } from './classifier/latency.js';
export {
  analyzeConnection,
  buildRuleContext,
  compareSeverity,
  evaluatePredicate,
  evaluateSuspicion,
  maxSeverity,
  ruleMatches,
  severityOf,
  EMPTY_RULE_CONTEXT,
  SEVERITY_RANK,
} from './classifier/rules/rule-evaluator.js';
export { DEFAULT_RULES_PATH, loadRuleSet, parseRuleSet } from './classifier/rules/rule-loader.js';
export type { RuleSetLoadResult } from './classifier/rules/rule-loader.js';
export {
  ConnectionStateSchema,
  LocalitySchema,
  PredicateSchema,
  RuleSchema,
  SeveritySchema,
} from './classifier/rules/rule-schema.js';
export { EMPTY_RULE_SET } from './classifier/rules/types.js';
export type {
  ConnectionAnalysis,
  PortRange,
  Repetition,
  Predicate,
  Rule,
  RuleContext,
  RuleSet,
} from './classifier/rules/types.js';

// Topology exports
export {
  aggregate,
  classifyConnections,
  dominantState,
  emptyStateCounts,
  heavyTalkerFlags,
  HOST_CENTER,
  LIST_CEILING,
  MAX_VISIBLE_ENDPOINTS,
  STATE_SEVERITY,
} from './topology/aggregator.js';
export type { AggregateOptions } from './topology/aggregator.js';

// Layout exports
export {
  computeLayout,
  layoutFor,
  layoutGraph,
  place,
  ringFor,
  ADAPTIVE_THRESHOLD,
  DEFAULT_RADII,
  EDGE_PADDING,
  RING_RATIOS,
} from './layout/layout-engine.js';

// Config exports
export {
  loadMonitorConfig,
  MonitorConfigSchema,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  CONFIG_FILE,
} from './config/monitor-config.js';
export type { ConfigLoadResult, LoadConfigOptions, MonitorConfig } from './config/monitor-config.js';

// Monitor exports
export {
  buildGraph,
  createProcfsSource,
  createStaticSource,
  deriveVisibility,
  filterByPid,
} from './monitor/pipeline.js';
export type {
  BuildGraphOptions,
  ConnectionSource,
  GraphBuild,
  Snapshot,
  SourceConfig,
  SourceOverrides,
  Visibility,
} from './monitor/pipeline.js';
export {
  createMonitorStore,
  selectIsBusy,
  selectSelectedConnection,
} from './monitor/monitor-store.js';
export type {
  MonitorPhase,
  MonitorStore,
  MonitorStoreActions,
  MonitorStoreApi,
  MonitorStoreOptions,
  MonitorStoreState,
  RefreshState,
  ViewMode,
} from './monitor/monitor-store.js';
export {
  ACTIVITY_HISTORY_LENGTH,
  BLINK_PERIOD_MS,
  PULSE_INCREMENT,
  SCAN_INTERVAL,
  UI_INTERVAL,
  CHANGE_HIGHLIGHT_MS,
  activityScore,
  clampInterval,
  recentlyChanged,
  stepInterval,
} from './monitor/refresh-config.js';
export type { IntervalBounds, IntervalDirection } from './monitor/refresh-config.js';
