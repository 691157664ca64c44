/**
 * Socket Scanner
 *
 * Reads the kernel socket tables and returns one Connection per record.
 * Strictly read-only. An unreadable table contributes nothing; the scan
 * as a whole never rejects, so an empty result means "nothing visible",
 * not "nothing open".
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { describeFsError } from '../errors/sockgraph-error.js';
import { silentLogger, type Logger } from '../infrastructure/logger.js';
import { parseSocketTable, type SocketTableSource } from './proc-net-parser.js';

import type { Connection, Protocol } from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface ScanOptions {
  /** Root of the proc filesystem (default /proc) */
  procRoot?: string;
  protocols?: readonly Protocol[];
  includeIpv6?: boolean;
  logger?: Logger;
  /** Clock used for observedAt */
  now?: () => number;
}

export interface ScanResult {
  connections: Connection[];
  tablesRead: string[];
  unreadableTables: string[];
  /** Malformed records skipped across all tables */
  skippedRecords: number;
  observedAt: number;
}

interface SocketTable extends SocketTableSource {
  readonly file: string;
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_PROC_ROOT = '/proc';

const SOCKET_TABLES: readonly SocketTable[] = [
  { file: 'tcp', protocol: 'tcp', family: 'ipv4' },
  { file: 'tcp6', protocol: 'tcp', family: 'ipv6' },
  { file: 'udp', protocol: 'udp', family: 'ipv4' },
  { file: 'udp6', protocol: 'udp', family: 'ipv6' },
];

// ============================================================================
// Scanner
// ============================================================================

function selectTables(options: ScanOptions): SocketTable[] {
  const protocols = options.protocols ?? ['tcp', 'udp'];
  const includeIpv6 = options.includeIpv6 ?? true;

  return SOCKET_TABLES.filter(
    (table) => protocols.includes(table.protocol) && (includeIpv6 || table.family === 'ipv4')
  );
}

/**
 * Scan every selected socket table
 */
export async function scanSockets(options: ScanOptions = {}): Promise<ScanResult> {
  const procRoot = options.procRoot ?? DEFAULT_PROC_ROOT;
  const logger = options.logger ?? silentLogger;
  const observedAt = (options.now ?? Date.now)();

  const result: ScanResult = {
    connections: [],
    tablesRead: [],
    unreadableTables: [],
    skippedRecords: 0,
    observedAt,
  };

  for (const table of selectTables(options)) {
    const tablePath = path.join(procRoot, 'net', table.file);

    let content: string;
    try {
      content = await fs.readFile(tablePath, 'utf-8');
    } catch (error) {
      logger.debug(`Socket table ${tablePath} not readable`, describeFsError(error));
      result.unreadableTables.push(table.file);
      continue;
    }

    const parsed = parseSocketTable(content, table, observedAt);
    result.connections.push(...parsed.connections);
    result.skippedRecords += parsed.skipped;
    result.tablesRead.push(table.file);

    if (parsed.skipped > 0) {
      logger.debug(`Skipped ${parsed.skipped} malformed record(s) in ${tablePath}`);
    }
  }

  if (result.tablesRead.length === 0) {
    logger.warn(`No socket tables readable under ${procRoot}; connection list will be empty`);
  }

  return result;
}

/**
 * Connection list only
 */
export async function scan(options: ScanOptions = {}): Promise<Connection[]> {
  const result = await scanSockets(options);
  return result.connections;
}
