import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { buildInodeIndex, correlate } from './process-correlator.js';
import { createFakeProc, removeFakeProc } from '../test-utils/fake-proc.js';
import { makeConnection } from '../test-utils/fixtures.js';
import type { Connection } from '../types/index.js';

function sampleConnections(): Connection[] {
  return [
    makeConnection({ inode: 1001 }),
    makeConnection({ inode: 2001 }),
    makeConnection({ inode: 4001 }),
    makeConnection({ inode: 9999 }),
    makeConnection({ state: 'time-wait' }),
  ];
}

describe('process correlator', () => {
  let procRoot: string;

  beforeAll(async () => {
    procRoot = await createFakeProc({
      processes: [
        { pid: 100, comm: 'nginx', socketInodes: [1001, 1002], otherFds: ['/dev/null', 'pipe:[77]'] },
        { pid: 200, comm: 'sshd', socketInodes: [2001] },
        { pid: 300, comm: 'locked', fdUnreadable: true },
        { pid: 400, socketInodes: [4001] },
        { pid: 500, comm: 'worker', socketInodes: [1001] },
      ],
      extraEntries: ['self', 'sys'],
    });
  });

  afterAll(async () => {
    await removeFakeProc(procRoot);
  });

  it('should index socket descriptors and skip unreadable processes', async () => {
    const { owners, stats } = await buildInodeIndex({ procRoot, platform: 'linux' });

    expect([...owners.keys()].sort((a, b) => a - b)).toEqual([1001, 1002, 2001, 4001]);
    expect(stats.processesScanned).toBe(4);
    expect(stats.processesSkipped).toBe(1);
    expect(stats.socketsIndexed).toBe(4);
  });

  it('should attribute shared sockets to the lowest pid', async () => {
    const { owners } = await buildInodeIndex({ procRoot, platform: 'linux' });
    expect(owners.get(1001)).toEqual({ pid: 100, name: 'nginx' });
  });

  it('should fill pid and name for matched connections', async () => {
    const connections = sampleConnections();
    const stats = await correlate(connections, { procRoot, platform: 'linux' });

    expect(stats.matched).toBe(3);
    expect(connections[0]?.pid).toBe(100);
    expect(connections[0]?.processName).toBe('nginx');
    expect(connections[1]?.processName).toBe('sshd');
  });

  it('should leave the name empty when comm is unreadable', async () => {
    const connections = sampleConnections();
    await correlate(connections, { procRoot, platform: 'linux' });

    expect(connections[2]?.pid).toBe(400);
    expect(connections[2]).not.toHaveProperty('processName');
  });

  it('should leave unmatched connections untouched', async () => {
    const connections = sampleConnections();
    await correlate(connections, { procRoot, platform: 'linux' });

    expect(connections[3]).not.toHaveProperty('pid');
    expect(connections[3]).not.toHaveProperty('processName');
    expect(connections[4]).not.toHaveProperty('pid');
  });

  it('should be idempotent over an unchanged process table', async () => {
    const connections = sampleConnections();
    await correlate(connections, { procRoot, platform: 'linux' });
    const first = connections.map((c) => ({ pid: c.pid, processName: c.processName }));

    await correlate(connections, { procRoot, platform: 'linux' });
    const second = connections.map((c) => ({ pid: c.pid, processName: c.processName }));

    expect(second).toEqual(first);
  });

  it('should be a no-op on platforms without procfs', async () => {
    const connections = sampleConnections();
    const stats = await correlate(connections, { procRoot, platform: 'darwin' });

    expect(stats).toEqual({
      processesScanned: 0,
      processesSkipped: 0,
      socketsIndexed: 0,
      matched: 0,
      budgetExceeded: false,
    });
    expect(connections.every((c) => c.pid === undefined)).toBe(true);
  });

  it('should stop walking once the budget is spent', async () => {
    let clock = 0;
    const connections = sampleConnections();

    const stats = await correlate(connections, {
      procRoot,
      platform: 'linux',
      budgetMs: 0,
      now: () => clock++,
    });

    expect(stats.budgetExceeded).toBe(true);
    expect(stats.processesScanned).toBe(0);
    expect(stats.processesSkipped).toBe(5);
    expect(stats.matched).toBe(0);
  });

  it('should return empty stats when the proc root is missing', async () => {
    const stats = await correlate(sampleConnections(), {
      procRoot: `${procRoot}-absent`,
      platform: 'linux',
    });

    expect(stats.processesScanned).toBe(0);
    expect(stats.matched).toBe(0);
  });
});
