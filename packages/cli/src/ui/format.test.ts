import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { buildGraph, createMonitorStore, createStaticSource } from 'sockgraph-core';
import { makeConnection, makeEndpoint } from 'sockgraph-core/testing';

import {
  formatConnection,
  formatEndpoint,
  formatFrame,
  formatProcess,
  formatSocketAddress,
  formatSummary,
  severityBadge,
  sparkline,
  visibilityNotice,
} from './format.js';

describe('format', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should bracket IPv6 addresses', () => {
    expect(formatSocketAddress({ address: '10.0.0.5', port: 22 })).toBe('10.0.0.5:22');
    expect(formatSocketAddress({ address: '::1', port: 22 })).toBe('[::1]:22');
  });

  it('should format the owning process', () => {
    expect(formatProcess(makeConnection({ pid: 100, processName: 'nginx' }))).toBe('nginx[100]');
    expect(formatProcess(makeConnection({ pid: 7 }))).toBe('[7]');
    expect(formatProcess(makeConnection())).toBe('-');
  });

  it('should format a connection row', () => {
    expect(formatConnection(makeConnection({ pid: 100, processName: 'nginx' }))).toBe(
      'tcp 10.0.0.5:40000        93.184.216.34:443     established  nginx[100]'
    );
    expect(
      formatConnection(makeConnection({ protocol: 'udp', local: ['0.0.0.0', 53], remote: null, state: 'listen' }))
    ).toBe('udp 0.0.0.0:53            *                     listen       -');
  });

  it('should format endpoints with flags and severity', () => {
    expect(formatEndpoint(makeEndpoint('203.0.113.9', 'low', 3))).toBe(
      '  203.0.113.9                                3 established  public      low'
    );
    expect(
      formatEndpoint({ ...makeEndpoint('203.0.113.9', 'high', 12), heavyTalker: true, severity: 'high' })
    ).toBe('* 203.0.113.9                               12 established  public      high    [HIGH]');
  });

  it('should label severities', () => {
    expect(severityBadge('critical')).toBe('[CRITICAL]');
    expect(severityBadge('low')).toBe('[LOW]');
    expect(severityBadge(null)).toBe('');
  });

  it('should summarize counts and non-zero states', () => {
    const { graph } = buildGraph(
      [
        makeConnection({ remote: ['10.0.0.1', 443] }),
        makeConnection({ local: ['10.0.0.5', 40001], remote: ['10.0.0.1', 443] }),
        makeConnection({ local: ['0.0.0.0', 22], remote: null, state: 'listen' }),
      ],
      { hostLabel: 'test-host' }
    );

    expect(formatSummary(graph.summary, 0)).toEqual([
      'connections 3  listening 1  endpoints 1  suspicious 0',
      'established 2, listen 1',
    ]);
    expect(formatSummary(graph.summary, 4)[2]).toBe('+4 more endpoint(s) not shown');
  });

  it('should only warn about degraded visibility', () => {
    expect(visibilityNotice('ok')).toBeNull();
    expect(visibilityNotice('none')).toBe('No socket tables readable: insufficient access or unsupported platform');
  });
});

describe('formatFrame', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  async function renderedStore() {
    const connections = [
      makeConnection({ remote: ['10.0.0.1', 443], pid: 100 }),
      makeConnection({ remote: ['10.0.0.2', 443], pid: 100 }),
    ];
    const store = createMonitorStore({
      source: createStaticSource(connections, () => 1_000),
      now: () => 1_000,
      hostLabel: 'test-host',
    });
    await store.getState().tick();
    return store;
  }

  it('should map activity scores onto bar heights', () => {
    expect(sparkline([5, 50, 100, 0])).toBe('▁▄█▁');
    expect(sparkline([])).toBe('');
  });

  it('should draw the activity history under the header', async () => {
    const store = await renderedStore();
    const lines = formatFrame(store.getState(), 10, 1_000);

    expect(lines[0]).toBe('● sockgraph  host  ui 100ms  scan 2000ms');
    expect(lines[2]).toBe('activity ▂');
  });

  it('should mark the intervals for a short while after a change', async () => {
    const store = await renderedStore();
    store.getState().adjustUiInterval(1);

    expect(formatFrame(store.getState(), 10, 1_200)[0]).toBe('● sockgraph  host  ui 150ms  scan 2000ms (changed)');
    expect(formatFrame(store.getState(), 10, 1_500)[0]).toBe('● sockgraph  host  ui 150ms  scan 2000ms');
  });
});
