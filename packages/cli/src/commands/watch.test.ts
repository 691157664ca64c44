import { describe, it, expect, beforeAll } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import chalk from 'chalk';
import { createStaticSource, DEFAULT_CONFIG, EMPTY_RULE_SET, silentLogger } from 'sockgraph-core';
import { makeConnection } from 'sockgraph-core/testing';

import { runWatch, WatchOptionsSchema } from './watch.js';
import type { CommandContext } from './context.js';

const context: CommandContext = {
  config: DEFAULT_CONFIG,
  logger: silentLogger,
  ruleSet: EMPTY_RULE_SET,
  diagnostics: [],
};

function captureOutput(): { output: Writable; text: () => string } {
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { output, text: () => chunks.join('') };
}

describe('watch command', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  async function watchUntilQuit(raw: Record<string, unknown>) {
    const input = new PassThrough();
    const { output, text } = captureOutput();
    let collects = 0;
    let waits = 0;
    const inner = createStaticSource(
      [
        makeConnection({ remote: ['10.0.0.1', 443], pid: 100, processName: 'nginx' }),
        makeConnection({ local: ['10.0.0.5', 40001], remote: ['203.0.113.5', 22] }),
      ],
      () => 0
    );

    await runWatch(WatchOptionsSchema.parse(raw), context, {
      source: {
        collect: () => {
          collects++;
          return inner.collect();
        },
      },
      input,
      output,
      hostLabel: 'test-host',
      wait: async () => {
        waits++;
        input.write('q');
        await new Promise((resolve) => setImmediate(resolve));
      },
    });

    return { collects, waits, text: text() };
  }

  it('should draw a frame and stop on q', async () => {
    const result = await watchUntilQuit({});

    expect(result.collects).toBe(1);
    expect(result.waits).toBe(1);
    expect(result.text).toContain('\nhost test-host\n');
    expect(result.text).toContain('\nconnections 2  listening 0  endpoints 2  suspicious 0\n');
    expect(result.text.endsWith('\x1b[?25h')).toBe(true);
  });

  it('should start focused on the requested process', async () => {
    const result = await watchUntilQuit({ pid: '100' });

    expect(result.text).toContain('\nprocess nginx [100]\n');
    expect(result.text).toContain('\nconnections 1  listening 0  endpoints 1  suspicious 0\n');
  });

  it('should validate interval bounds', () => {
    expect(WatchOptionsSchema.safeParse({ uiInterval: '10' }).success).toBe(false);
    expect(WatchOptionsSchema.safeParse({ scanInterval: '60000' }).success).toBe(false);
    expect(WatchOptionsSchema.parse({ uiInterval: '250' }).uiInterval).toBe(250);
  });
});
