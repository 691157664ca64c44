/**
 * Integration tests for the MCP tools over a fixed connection list
 */

import { describe, it, expect, beforeAll } from 'vitest';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { createStaticSource, DEFAULT_CONFIG, loadRuleSet, type Connection, type RuleSet } from 'sockgraph-core';
import { connectionsTo, makeConnection } from 'sockgraph-core/testing';

import { ALL_TOOLS, callTool, FALLBACK_STEPS, groupByProcess, investigationSteps } from '../index.js';
import type { ToolContext } from '../context.js';

function sampleConnections(): Connection[] {
  return [
    ...connectionsTo('198.51.100.7', 3, { remote: ['198.51.100.7', 50000], pid: 300, processName: 'beacon' }),
    makeConnection({ local: ['10.0.0.5', 41000], remote: ['10.0.0.1', 443], pid: 100, processName: 'nginx' }),
    makeConnection({ local: ['10.0.0.5', 41001], remote: ['10.0.0.2', 443], pid: 100, processName: 'nginx' }),
    makeConnection({ local: ['0.0.0.0', 22], remote: null, state: 'listen', pid: 200, processName: 'sshd' }),
    makeConnection({ local: ['127.0.0.1', 41002], remote: ['127.0.0.1', 5432], state: 'time-wait' }),
  ];
}

function payload(result: { content: Array<{ text: string }> }) {
  return JSON.parse(result.content[0]?.text ?? '');
}

describe('MCP tools', () => {
  let ruleSet: RuleSet;
  let context: ToolContext;

  beforeAll(async () => {
    ({ ruleSet } = await loadRuleSet());
    context = {
      source: createStaticSource(sampleConnections(), () => 0),
      ruleSet,
      config: DEFAULT_CONFIG,
      hostLabel: 'test-host',
    };
  });

  it('should register the four tools', () => {
    expect(ALL_TOOLS.map((t) => t.name)).toEqual([
      'sockgraph_topology',
      'sockgraph_processes',
      'sockgraph_connections',
      'sockgraph_suspicious',
    ]);
  });

  describe('sockgraph_connections', () => {
    it('should list every connection with its locality', async () => {
      const response = payload(await callTool(context, 'sockgraph_connections', {}));

      expect(response.data.total).toBe(7);
      expect(response.data.connections[5]).toEqual({
        protocol: 'tcp',
        local: '0.0.0.0:22',
        remote: null,
        state: 'listen',
        pid: 200,
        processName: 'sshd',
        locality: 'listen-only',
      });
      expect(response.data.connections[6].locality).toBe('loopback');
    });

    it('should filter by state and pid', async () => {
      const byState = payload(await callTool(context, 'sockgraph_connections', { state: 'time-wait' }));
      expect(byState.data.total).toBe(1);
      expect(byState.data.connections[0].remote).toBe('127.0.0.1:5432');

      const byPid = payload(await callTool(context, 'sockgraph_connections', { pid: 100 }));
      expect(byPid.summary).toBe('2 of 7 connection(s) match for pid 100');
    });

    it('should report truncation', async () => {
      const response = payload(await callTool(context, 'sockgraph_connections', { limit: 2 }));

      expect(response.data.connections).toHaveLength(2);
      expect(response.truncation).toEqual({ returned: 2, total: 7 });
    });

    it('should reject invalid arguments', async () => {
      const result = await callTool(context, 'sockgraph_connections', { state: 'open' });

      expect(result.isError).toBe(true);
      expect(payload(result).error.code).toBe('INVALID_ARGUMENT');
      expect(payload(result).error.details.param).toBe('state');
    });
  });

  describe('sockgraph_suspicious', () => {
    it('should list flagged connections most severe first', async () => {
      const response = payload(await callTool(context, 'sockgraph_suspicious', {}));

      expect(response.data.total).toBe(4);
      expect(response.data.bySeverity).toEqual({ low: 1, medium: 0, high: 3, critical: 0 });
      expect(response.data.connections[0]).toMatchObject({
        remote: '198.51.100.7:50000',
        severity: 'high',
        ruleIds: ['external-high-port', 'high-port-beaconing'],
        tags: ['beacon', 'c2', 'egress'],
      });
      expect(response.data.connections[3].ruleIds).toEqual(['privileged-port-binding']);
    });

    it('should explain each match and suggest follow-up steps', async () => {
      const response = payload(await callTool(context, 'sockgraph_suspicious', {}));
      const beacon = response.data.connections[0];

      expect(beacon.reasons).toEqual([
        {
          ruleId: 'external-high-port',
          severity: 'low',
          reason: 'An established connection to a public address on a port above 10000.',
        },
        {
          ruleId: 'high-port-beaconing',
          severity: 'high',
          reason:
            'Repeated established connections to a public address on a dynamic port. Typical of command-and-control beacons.',
        },
      ]);
      expect(beacon.investigation).toEqual([
        'Inspect the owning process: ps -p 300 -o pid,ppid,user,cmd',
        'Check whether connections to the remote recur on a fixed period',
        'Look up the reputation of the remote address',
        'Hash the process binary: sha256sum /proc/300/exe',
        'Watch the transfer volume to the remote: nethogs or iftop',
      ]);
      expect(response.data.connections[3].investigation).toEqual([
        'Inspect the owning process: ps -p 200 -o pid,ppid,user,cmd',
        'List listening sockets with their owners: ss -tlnp',
        'Confirm the port belongs to an intended service',
        'Review the firewall rules for the port',
      ]);
    });

    it('should honour the severity threshold', async () => {
      const response = payload(await callTool(context, 'sockgraph_suspicious', { minSeverity: 'high' }));

      expect(response.data.total).toBe(3);
    });

    it('should warn when no rules are loaded', async () => {
      const response = payload(
        await callTool({ ...context, ruleSet: { version: 1, rules: [] } }, 'sockgraph_suspicious', {})
      );

      expect(response.summary).toBe('No connections matched any suspicion rule');
      expect(response.hints.warnings).toEqual(['No suspicion rules are loaded.']);
    });
  });

  describe('sockgraph_topology', () => {
    it('should return the ranked endpoints', async () => {
      const response = payload(await callTool(context, 'sockgraph_topology', {}));

      expect(response.data.center).toEqual({ kind: 'host', label: 'test-host' });
      expect(response.data.endpoints.map((e: { address: string }) => e.address)).toEqual([
        '198.51.100.7',
        '10.0.0.1',
        '10.0.0.2',
        '127.0.0.1',
      ]);
      expect(response.data.endpoints[0].heavyTalker).toBe(true);
      expect(response.data.dropped).toBe(0);
    });

    it('should position endpoints on the nominal canvas', async () => {
      const response = payload(await callTool(context, 'sockgraph_topology', {}));

      expect(response.data.canvas).toEqual({ width: 80, height: 24 });
      expect(response.data.endpoints[0].position).toEqual({ x: 40, y: 5 });
      expect(response.data.endpoints[1].position).toEqual({ x: 50, y: 12 });
    });

    it('should bound the endpoint list', async () => {
      const response = payload(await callTool(context, 'sockgraph_topology', { limit: 2 }));

      expect(response.data.endpoints).toHaveLength(2);
      expect(response.data.dropped).toBe(2);
      expect(response.hints.nextActions).toEqual([
        '2 endpoint(s) were left out; pass a larger limit to include them',
      ]);
    });

    it('should focus on a process', async () => {
      const response = payload(await callTool(context, 'sockgraph_topology', { pid: 100 }));

      expect(response.data.center).toEqual({ kind: 'process', pid: 100, label: 'nginx' });
      expect(response.summary).toBe('2 connection(s) to 2 endpoint(s) from process nginx');
    });

    it('should report an unknown pid as an error result', async () => {
      const result = await callTool(context, 'sockgraph_topology', { pid: 4242 });

      expect(result.isError).toBe(true);
      expect(payload(result).error.code).toBe('PROCESS_NOT_FOUND');
    });
  });

  describe('sockgraph_processes', () => {
    it('should group sockets by process', async () => {
      const response = payload(await callTool(context, 'sockgraph_processes', {}));

      expect(response.data.unattributed).toBe(1);
      expect(response.data.processes.map((p: { pid: number }) => p.pid)).toEqual([300, 100, 200]);
      expect(response.data.processes[2]).toEqual({
        pid: 200,
        name: 'sshd',
        connections: 1,
        listeningPorts: [22],
        remoteEndpoints: 0,
        states: { listen: 1 },
      });
    });

    it('should filter by name', async () => {
      const response = payload(await callTool(context, 'sockgraph_processes', { name: 'NGI' }));

      expect(response.summary).toBe("1 process(es) own sockets matching 'NGI'");
      expect(response.data.processes[0].remoteEndpoints).toBe(2);
    });

    it('should skip unattributed connections when grouping', () => {
      expect(groupByProcess([makeConnection()])).toEqual([]);
    });
  });

  it('should produce results the SDK accepts', async () => {
    for (const tool of ALL_TOOLS) {
      const result = await callTool(context, tool.name, {});
      expect(CallToolResultSchema.safeParse(result).success).toBe(true);
    }
    expect(CallToolResultSchema.safeParse(await callTool(context, 'sockgraph_nope', {})).success).toBe(true);
  });

  describe('investigationSteps', () => {
    it('should fall back to generic steps without a pid or known tags', () => {
      expect(investigationSteps(undefined, ['unknown-tag'])).toEqual([...FALLBACK_STEPS]);
    });

    it('should keep the pid placeholder when the owner is unknown', () => {
      expect(investigationSteps(undefined, ['c2'])).toContain('Hash the process binary: sha256sum /proc/<pid>/exe');
    });
  });

  it('should reject unknown tools', async () => {
    const result = await callTool(context, 'sockgraph_nope', {});

    expect(result.isError).toBe(true);
    expect(payload(result).error.details.param).toBe('name');
  });
});
