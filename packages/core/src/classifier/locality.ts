/**
 * Locality classification of remote addresses
 *
 * Precedence: listen-only (no peer, whatever the local address), then
 * loopback, then private, then public. Addresses are expected in the text form the scanner produces;
 * anything unparseable is public.
 */

import type { Connection, Locality } from '../types/index.js';

export type AddressScope = Exclude<Locality, 'listen-only'>;

// ============================================================================
// IPv4
// ============================================================================

function parseIPv4(address: string): number[] | null {
  const parts = address.split('.');
  if (parts.length !== 4) return null;

  const octets = parts.map((part) => (/^\d{1,3}$/.test(part) ? Number(part) : NaN));
  return octets.every((o) => Number.isInteger(o) && o <= 255) ? octets : null;
}

function scopeOfIPv4(octets: readonly number[]): AddressScope {
  const [a = 0, b = 0] = octets;

  if (a === 127 || octets.every((o) => o === 0)) return 'loopback';
  if (a === 10) return 'private';
  if (a === 172 && b >= 16 && b <= 31) return 'private';
  if (a === 192 && b === 168) return 'private';
  return 'public';
}

// ============================================================================
// IPv6
// ============================================================================

function firstIPv6Group(address: string): number | null {
  if (!address.includes(':')) return null;
  if (address.startsWith('::')) return 0;

  const head = address.split(':')[0] ?? '';
  return /^[0-9a-fA-F]{1,4}$/.test(head) ? parseInt(head, 16) : null;
}

function scopeOfIPv6(address: string, firstGroup: number): AddressScope {
  const lower = address.toLowerCase();
  if (lower === '::1' || lower === '::') return 'loopback';
  // fc00::/7 unique-local
  if ((firstGroup & 0xfe00) === 0xfc00) return 'private';
  // fe80::/10 link-local
  if ((firstGroup & 0xffc0) === 0xfe80) return 'private';
  return 'public';
}

// ============================================================================
// Public API
// ============================================================================

export function classifyAddress(address: string): AddressScope {
  const octets = parseIPv4(address);
  if (octets) return scopeOfIPv4(octets);

  const firstGroup = firstIPv6Group(address);
  if (firstGroup !== null) return scopeOfIPv6(address, firstGroup);

  return 'public';
}

export function classify(connection: Connection): Locality {
  if (!connection.remote) return 'listen-only';
  return classifyAddress(connection.remote.address);
}
