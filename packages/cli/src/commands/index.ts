/**
 * Commands module exports
 *
 * Exports all CLI commands for registration with Commander.js
 */

export { snapshotCommand } from './snapshot.js';
export { watchCommand } from './watch.js';
export { rulesCommand } from './rules.js';
