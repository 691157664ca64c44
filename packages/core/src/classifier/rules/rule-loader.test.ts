import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { loadRuleSet, parseRuleSet } from './rule-loader.js';
import { buildRuleContext, evaluateSuspicion } from './rule-evaluator.js';
import { connectionsTo, makeConnection } from '../../test-utils/fixtures.js';

const validRule = {
  id: 'listen-high',
  name: 'High listener',
  severity: 'medium',
  tags: ['listener'],
  match: { all: [{ state: { in: ['listen'] } }, { localPort: { min: 10000 } }] },
};

describe('parseRuleSet', () => {
  it('should accept a valid rule set and apply defaults', () => {
    const { ruleSet, diagnostics } = parseRuleSet({ version: 1, rules: [validRule] });

    expect(diagnostics).toEqual([]);
    expect(ruleSet.rules).toHaveLength(1);
    expect(ruleSet.rules[0]?.description).toBe('');
  });

  it('should reject a malformed envelope entirely', () => {
    const { ruleSet, diagnostics } = parseRuleSet({ rules: 'nope' }, 'inline.json');

    expect(ruleSet.rules).toEqual([]);
    expect(diagnostics.length).toBeGreaterThan(0);
    expect(diagnostics[0]?.source).toBe('inline.json');
  });

  it('should drop invalid rules and keep the rest', () => {
    const { ruleSet, diagnostics } = parseRuleSet({
      version: 1,
      rules: [validRule, { ...validRule, id: 'bad', severity: 'extreme' }],
    });

    expect(ruleSet.rules.map((r) => r.id)).toEqual(['listen-high']);
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0]?.message).toMatch(/^rules\.1\.severity: /);
  });

  it('should drop duplicate rule ids', () => {
    const { ruleSet, diagnostics } = parseRuleSet({ version: 1, rules: [validRule, validRule] });

    expect(ruleSet.rules).toHaveLength(1);
    expect(diagnostics[0]?.message).toBe("rules.1: duplicate rule id 'listen-high'");
  });

  it('should reject inverted port ranges', () => {
    const { ruleSet, diagnostics } = parseRuleSet({
      version: 1,
      rules: [{ ...validRule, match: { remotePort: { min: 9000, max: 80 } } }],
    });

    expect(ruleSet.rules).toEqual([]);
    expect(diagnostics.length).toBeGreaterThan(0);
  });

  it('should reject unknown predicate kinds', () => {
    const { ruleSet } = parseRuleSet({
      version: 1,
      rules: [{ ...validRule, match: { country: { in: ['XX'] } } }],
    });

    expect(ruleSet.rules).toEqual([]);
  });
});

describe('loadRuleSet', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'sockgraph-rules-'));
    await fs.writeFile(path.join(dir, 'broken.json'), '{ "version": 1, ');
    await fs.writeFile(path.join(dir, 'rules.json'), JSON.stringify({ version: 2, rules: [validRule] }));
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should load a rule file', async () => {
    const result = await loadRuleSet(path.join(dir, 'rules.json'));

    expect(result.ruleSet.version).toBe(2);
    expect(result.ruleSet.rules).toHaveLength(1);
    expect(result.diagnostics).toEqual([]);
  });

  it('should fall back to no rules when the file is missing', async () => {
    const result = await loadRuleSet(path.join(dir, 'absent.json'));

    expect(result.ruleSet.rules).toEqual([]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.message).toMatch(/^cannot read rule file: ENOENT/);
  });

  it('should fall back to no rules on invalid JSON', async () => {
    const result = await loadRuleSet(path.join(dir, 'broken.json'));

    expect(result.ruleSet.rules).toEqual([]);
    expect(result.diagnostics[0]?.message).toMatch(/^invalid JSON: /);
  });

  it('should load the bundled rules cleanly', async () => {
    const result = await loadRuleSet();

    expect(result.diagnostics).toEqual([]);
    expect(result.ruleSet.rules.map((r) => r.id)).toEqual([
      'high-port-beaconing',
      'unexpected-listener',
      'privileged-port-binding',
      'excessive-close-wait',
      'excessive-time-wait',
      'failed-connection-attempts',
      'external-high-port',
      'orphan-socket',
    ]);
  });

  it('should flag beaconing with the bundled rules', async () => {
    const { ruleSet } = await loadRuleSet();
    const connections = connectionsTo('203.0.113.7', 3, { remote: ['203.0.113.7', 50001], pid: 42 });
    const first = connections[0];
    if (!first) throw new Error('fixture missing');

    const matched = evaluateSuspicion(first, ruleSet, buildRuleContext(connections));

    expect(matched).toEqual(new Set(['high-port-beaconing', 'external-high-port']));
  });

  it('should not count established neighbours toward the bundled close-wait rule', async () => {
    const { ruleSet } = await loadRuleSet();
    const connections = [
      makeConnection({ local: ['10.0.0.5', 39999], remote: ['10.9.9.9', 8080], state: 'close-wait', pid: 7 }),
      ...connectionsTo('10.9.9.9', 4, { remote: ['10.9.9.9', 8080], pid: 7 }),
    ];
    const closeWait = connections[0];
    if (!closeWait) throw new Error('fixture missing');

    expect(evaluateSuspicion(closeWait, ruleSet, buildRuleContext(connections))).toEqual(new Set());
  });

  it('should flag five close-wait sockets to one peer with the bundled rules', async () => {
    const { ruleSet } = await loadRuleSet();
    const connections = connectionsTo('10.9.9.9', 5, { remote: ['10.9.9.9', 8080], state: 'close-wait', pid: 7 });
    const first = connections[0];
    if (!first) throw new Error('fixture missing');

    expect(evaluateSuspicion(first, ruleSet, buildRuleContext(connections))).toEqual(new Set(['excessive-close-wait']));
  });
});
