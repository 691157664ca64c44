/**
 * sockgraph-cli - Command-line interface for sockgraph
 */

export const VERSION = '0.1.0';

export { snapshotCommand, runSnapshot } from './commands/snapshot.js';
export type { SnapshotOptions, SnapshotIO } from './commands/snapshot.js';
export { watchCommand, runWatch } from './commands/watch.js';
export type { WatchOptions, WatchIO } from './commands/watch.js';
export { rulesCommand, checkRules, listRules } from './commands/rules.js';
export { commandForKey, dispatchCommand } from './commands/key-bindings.js';
export type { KeyPress, MonitorCommand } from './commands/key-bindings.js';
