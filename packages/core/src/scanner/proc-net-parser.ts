/**
 * Parsers for the kernel socket tables (/proc/net/{tcp,tcp6,udp,udp6}).
 *
 * Record layout:
 *   sl  local_address rem_address   st tx_queue:rx_queue tr:tm->when retrnsmt uid timeout inode
 *   0: 0100007F:1F90 00000000:0000 0A 00000000:00000000 00:00000000 00000000 1000 0 12345
 *
 * Addresses are 32-bit words in host (little-endian) byte order, ports are
 * big-endian. A record that fails any step parses to null.
 */

import type {
  AddressFamily,
  Connection,
  ConnectionState,
  Protocol,
  SocketAddress,
} from '../types/index.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * TCP state codes from include/net/tcp_states.h
 */
export const TCP_STATE_CODES: Readonly<Record<string, ConnectionState>> = {
  '01': 'established',
  '02': 'syn-sent',
  '03': 'syn-received',
  '04': 'fin-wait-1',
  '05': 'fin-wait-2',
  '06': 'time-wait',
  '07': 'closed',
  '08': 'close-wait',
  '09': 'last-ack',
  '0A': 'listen',
  '0B': 'closing',
};

const MIN_RECORD_FIELDS = 10;
const HEX_IPV4 = /^[0-9A-Fa-f]{8}$/;
const HEX_IPV6 = /^[0-9A-Fa-f]{32}$/;
const HEX_PORT = /^[0-9A-Fa-f]{1,4}$/;
const DECIMAL = /^\d+$/;

// ============================================================================
// Address Decoding
// ============================================================================

/**
 * Decode one little-endian 32-bit word ("0100007F") into network-order bytes
 */
function decodeWord(hex: string): number[] {
  const bytes: number[] = [];
  for (let i = 0; i < 8; i += 2) {
    bytes.push(parseInt(hex.slice(i, i + 2), 16));
  }
  return bytes.reverse();
}

/**
 * "0100007F" -> "127.0.0.1"
 */
export function parseHexIPv4(hex: string): string | null {
  if (!HEX_IPV4.test(hex)) return null;
  return decodeWord(hex).join('.');
}

/**
 * Decode a 32-char IPv6 field. IPv4-mapped addresses come back in dotted
 * IPv4 form so they classify like their IPv4 counterparts.
 */
export function parseHexIPv6(hex: string): string | null {
  if (!HEX_IPV6.test(hex)) return null;

  const bytes: number[] = [];
  for (let i = 0; i < 32; i += 8) {
    bytes.push(...decodeWord(hex.slice(i, i + 8)));
  }

  const isMapped = bytes.slice(0, 10).every((b) => b === 0) && bytes[10] === 0xff && bytes[11] === 0xff;
  if (isMapped) {
    return bytes.slice(12).join('.');
  }

  const groups: number[] = [];
  for (let i = 0; i < 16; i += 2) {
    groups.push(((bytes[i] ?? 0) << 8) | (bytes[i + 1] ?? 0));
  }
  return formatIPv6Groups(groups);
}

/**
 * Canonical text form: lowercase, no leading zeros, longest zero run
 * (length >= 2, first one wins) collapsed to "::"
 */
export function formatIPv6Groups(groups: readonly number[]): string {
  let bestStart = -1;
  let bestLength = 0;
  let runStart = -1;

  for (let i = 0; i <= groups.length; i++) {
    if (i < groups.length && groups[i] === 0) {
      if (runStart === -1) runStart = i;
      continue;
    }
    if (runStart !== -1) {
      const length = i - runStart;
      if (length > bestLength) {
        bestStart = runStart;
        bestLength = length;
      }
      runStart = -1;
    }
  }

  const hex = groups.map((g) => g.toString(16));
  if (bestLength < 2) {
    return hex.join(':');
  }

  const head = hex.slice(0, bestStart).join(':');
  const tail = hex.slice(bestStart + bestLength).join(':');
  return `${head}::${tail}`;
}

/**
 * "0100007F:1F90" -> { address: "127.0.0.1", port: 8080 }
 */
export function parseSocketAddress(field: string, family: AddressFamily): SocketAddress | null {
  const parts = field.split(':');
  if (parts.length !== 2) return null;

  const [hexAddress = '', hexPort = ''] = parts;
  const address = family === 'ipv4' ? parseHexIPv4(hexAddress) : parseHexIPv6(hexAddress);
  if (address === null || !HEX_PORT.test(hexPort)) return null;

  return { address, port: parseInt(hexPort, 16) };
}

export function isUnspecifiedAddress(address: string): boolean {
  return address === '0.0.0.0' || address === '::';
}

// ============================================================================
// Record Parsing
// ============================================================================

export interface SocketTableSource {
  readonly protocol: Protocol;
  readonly family: AddressFamily;
}

/**
 * Parse one data line of a socket table
 */
export function parseSocketLine(
  line: string,
  source: SocketTableSource,
  observedAt: number
): Connection | null {
  const parts = line.trim().split(/\s+/);
  if (parts.length < MIN_RECORD_FIELDS) return null;

  const local = parseSocketAddress(parts[1] ?? '', source.family);
  const peer = parseSocketAddress(parts[2] ?? '', source.family);
  if (!local || !peer) return null;

  const remote = peer.port === 0 && isUnspecifiedAddress(peer.address) ? undefined : peer;

  const state = resolveState((parts[3] ?? '').toUpperCase(), source.protocol, remote);
  if (!state) return null;

  const inodeField = parts[9] ?? '';
  if (!DECIMAL.test(inodeField)) return null;
  const inode = Number(inodeField);

  return {
    protocol: source.protocol,
    family: source.family,
    local,
    ...(remote ? { remote } : {}),
    state,
    ...(inode > 0 ? { inode } : {}),
    observedAt,
  };
}

/**
 * UDP has no handshake; a socket without a peer is waiting for datagrams
 * and is reported as listening
 */
function resolveState(
  code: string,
  protocol: Protocol,
  remote: SocketAddress | undefined
): ConnectionState | null {
  if (protocol === 'udp' && !remote) {
    return 'listen';
  }
  return TCP_STATE_CODES[code] ?? null;
}

export interface ParsedTable {
  connections: Connection[];
  /** Data lines that failed to parse */
  skipped: number;
}

/**
 * Parse a whole table. The header line is dropped; blank lines are ignored;
 * malformed lines are counted and skipped.
 */
export function parseSocketTable(
  content: string,
  source: SocketTableSource,
  observedAt: number
): ParsedTable {
  const connections: Connection[] = [];
  let skipped = 0;

  for (const line of content.split('\n').slice(1)) {
    if (line.trim() === '') continue;

    const connection = parseSocketLine(line, source, observedAt);
    if (connection) {
      connections.push(connection);
    } else {
      skipped++;
    }
  }

  return { connections, skipped };
}
