/**
 * Socket table parser tests
 */

import { describe, it, expect } from 'vitest';
import {
  formatIPv6Groups,
  parseHexIPv4,
  parseHexIPv6,
  parseSocketAddress,
  parseSocketLine,
  parseSocketTable,
  TCP_STATE_CODES,
} from './proc-net-parser.js';
import { socketLine } from '../test-utils/fake-proc.js';

const TCP4 = { protocol: 'tcp', family: 'ipv4' } as const;
const UDP4 = { protocol: 'udp', family: 'ipv4' } as const;

describe('parseHexIPv4', () => {
  it('should decode little-endian words', () => {
    expect(parseHexIPv4('0100007F')).toBe('127.0.0.1');
    expect(parseHexIPv4('00000000')).toBe('0.0.0.0');
    expect(parseHexIPv4('0101A8C0')).toBe('192.168.1.1');
  });

  it('should reject malformed input', () => {
    expect(parseHexIPv4('0100007')).toBeNull();
    expect(parseHexIPv4('GGGGGGGG')).toBeNull();
    expect(parseHexIPv4('')).toBeNull();
  });
});

describe('parseHexIPv6', () => {
  it('should decode loopback and unspecified addresses', () => {
    expect(parseHexIPv6('00000000000000000000000001000000')).toBe('::1');
    expect(parseHexIPv6('00000000000000000000000000000000')).toBe('::');
  });

  it('should decode link-local addresses', () => {
    expect(parseHexIPv6('000080FE000000000000000001000000')).toBe('fe80::1');
  });

  it('should render IPv4-mapped addresses as IPv4', () => {
    expect(parseHexIPv6('0000000000000000FFFF00000501A8C0')).toBe('192.168.1.5');
  });

  it('should reject wrong lengths', () => {
    expect(parseHexIPv6('0100007F')).toBeNull();
  });
});

describe('formatIPv6Groups', () => {
  it('should collapse the longest zero run', () => {
    expect(formatIPv6Groups([0x2001, 0x0db8, 0, 0, 0, 0xff00, 0x42, 0x8329])).toBe('2001:db8::ff00:42:8329');
    expect(formatIPv6Groups([1, 0, 0, 2, 0, 0, 0, 3])).toBe('1:0:0:2::3');
  });

  it('should not collapse a single zero group', () => {
    expect(formatIPv6Groups([1, 0, 2, 3, 4, 5, 6, 7])).toBe('1:0:2:3:4:5:6:7');
  });
});

describe('parseSocketAddress', () => {
  it('should parse address and big-endian port', () => {
    expect(parseSocketAddress('0100007F:1F90', 'ipv4')).toEqual({ address: '127.0.0.1', port: 8080 });
  });

  it('should reject fields without exactly one separator', () => {
    expect(parseSocketAddress('0100007F', 'ipv4')).toBeNull();
    expect(parseSocketAddress('0100007F:1F90:00', 'ipv4')).toBeNull();
  });

  it('should reject bad ports', () => {
    expect(parseSocketAddress('0100007F:XYZ1', 'ipv4')).toBeNull();
  });
});

describe('TCP_STATE_CODES', () => {
  it('should cover the eleven kernel states', () => {
    expect(Object.keys(TCP_STATE_CODES)).toHaveLength(11);
    expect(TCP_STATE_CODES['06']).toBe('time-wait');
    expect(TCP_STATE_CODES['08']).toBe('close-wait');
  });
});

describe('parseSocketLine', () => {
  it('should parse a listening socket without a remote', () => {
    const line = socketLine(0, ['127.0.0.1', 8080], ['0.0.0.0', 0], '0A', 12345);

    expect(parseSocketLine(line, TCP4, 1000)).toEqual({
      protocol: 'tcp',
      family: 'ipv4',
      local: { address: '127.0.0.1', port: 8080 },
      state: 'listen',
      inode: 12345,
      observedAt: 1000,
    });
  });

  it('should parse an established socket with a remote', () => {
    const line = socketLine(1, ['10.0.0.5', 51000], ['93.184.216.34', 443], '01', 222);
    const connection = parseSocketLine(line, TCP4, 1000);

    expect(connection?.state).toBe('established');
    expect(connection?.remote).toEqual({ address: '93.184.216.34', port: 443 });
    expect(connection?.inode).toBe(222);
  });

  it('should treat inode 0 as absent', () => {
    const line = socketLine(2, ['10.0.0.5', 51001], ['10.0.0.9', 22], '06', 0);
    const connection = parseSocketLine(line, TCP4, 1000);

    expect(connection?.state).toBe('time-wait');
    expect(connection).not.toHaveProperty('inode');
  });

  it('should accept lowercase state codes', () => {
    const line = socketLine(0, ['127.0.0.1', 80], ['0.0.0.0', 0], '0a', 1);
    expect(parseSocketLine(line, TCP4, 0)?.state).toBe('listen');
  });

  it('should reject unknown state codes', () => {
    const line = socketLine(0, ['127.0.0.1', 80], ['10.0.0.1', 5000], 'FF', 1);
    expect(parseSocketLine(line, TCP4, 0)).toBeNull();
  });

  it('should reject truncated records', () => {
    expect(parseSocketLine('0: 0100007F:1F90 00000000:0000 0A', TCP4, 0)).toBeNull();
  });

  it('should report unconnected UDP sockets as listening', () => {
    const line = socketLine(0, ['0.0.0.0', 53], ['0.0.0.0', 0], '07', 999);
    expect(parseSocketLine(line, UDP4, 0)?.state).toBe('listen');
  });

  it('should report connected UDP sockets as established', () => {
    const line = socketLine(0, ['10.0.0.5', 40000], ['10.0.0.1', 53], '01', 998);
    expect(parseSocketLine(line, UDP4, 0)?.state).toBe('established');
  });
});

describe('parseSocketTable', () => {
  it('should skip the header, blank lines and malformed records', () => {
    const content = [
      '  sl  local_address rem_address   st',
      socketLine(0, ['127.0.0.1', 8080], ['0.0.0.0', 0], '0A', 1),
      'this is not a socket record',
      socketLine(1, ['10.0.0.5', 51000], ['10.0.0.9', 22], '01', 2),
      '',
    ].join('\n');

    const result = parseSocketTable(content, TCP4, 5);

    expect(result.connections).toHaveLength(2);
    expect(result.skipped).toBe(1);
    expect(result.connections.map((c) => c.inode)).toEqual([1, 2]);
  });
});
