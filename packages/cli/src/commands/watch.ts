/**
 * Watch Command - sockgraph watch
 *
 * Live view: drives the monitor store at the UI cadence, redraws the
 * terminal after every tick and maps keypresses onto store commands.
 */

import { Command } from 'commander';
import * as readline from 'node:readline';
import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import {
  createMonitorStore,
  createProcfsSource,
  SCAN_INTERVAL,
  UI_INTERVAL,
  type CanvasSize,
  type ConnectionSource,
} from 'sockgraph-core';

import { createContext, GlobalOptionsSchema, intOption, parseOptions, type CommandContext } from './context.js';
import { commandForKey, dispatchCommand, type KeyPress } from './key-bindings.js';
import { formatFrame } from '../ui/format.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const HIDE_CURSOR = '\x1b[?25l';
const SHOW_CURSOR = '\x1b[?25h';

/** Rows kept for the header, summary and key help */
const RESERVED_ROWS = 10;

export const WatchOptionsSchema = z.object({
  pid: intOption(1).optional(),
  uiInterval: intOption(UI_INTERVAL.minMs).max(UI_INTERVAL.maxMs).optional(),
  scanInterval: intOption(SCAN_INTERVAL.minMs).max(SCAN_INTERVAL.maxMs).optional(),
  rules: z.string().min(1).optional(),
});

export type WatchOptions = z.infer<typeof WatchOptionsSchema>;

export type WatchInput = NodeJS.ReadableStream & {
  isTTY?: boolean | undefined;
  setRawMode?: ((mode: boolean) => unknown) | undefined;
};

export type WatchOutput = NodeJS.WritableStream & {
  columns?: number | undefined;
  rows?: number | undefined;
};

export interface WatchIO {
  source?: ConnectionSource;
  input: WatchInput;
  output: WatchOutput;
  hostLabel?: string;
  /** Wait between ticks */
  wait?: (ms: number) => Promise<unknown>;
}

function canvasOf(output: WatchOutput): CanvasSize {
  return { width: output.columns ?? 80, height: output.rows ?? 24 };
}

export async function runWatch(options: WatchOptions, context: CommandContext, io: WatchIO): Promise<void> {
  const { config, logger, ruleSet } = context;
  const wait = io.wait ?? ((ms: number) => sleep(ms));

  const store = createMonitorStore({
    source: io.source ?? createProcfsSource(config, logger),
    ruleSet,
    canvas: canvasOf(io.output),
    uiIntervalMs: options.uiInterval ?? config.refresh.uiIntervalMs,
    scanIntervalMs: options.scanInterval ?? config.refresh.scanIntervalMs,
    maxVisible: config.maxVisibleEndpoints,
    latencyThresholds: config.latency,
    logger,
    ...(io.hostLabel !== undefined ? { hostLabel: io.hostLabel } : {}),
  });

  if (options.pid !== undefined) {
    // Focus once the first snapshot is in
    await store.getState().tick();
    const index = store.getState().visibleConnections.findIndex((c) => c.pid === options.pid);
    if (index >= 0) {
      for (let i = 0; i <= index; i++) store.getState().selectNext();
      store.getState().toggleFocus();
    } else {
      logger.warn(`No visible sockets owned by pid ${options.pid}; showing the whole host`);
    }
  }

  const onKeypress = (_sequence: string | undefined, key: KeyPress | undefined) => {
    const command = commandForKey(key ?? {});
    if (command) dispatchCommand(store, command);
  };
  const onResize = () => store.getState().setCanvas(canvasOf(io.output));
  const onSignal = () => store.getState().stop();

  readline.emitKeypressEvents(io.input);
  if (io.input.isTTY && io.input.setRawMode) io.input.setRawMode(true);
  io.input.on('keypress', onKeypress);
  io.input.resume();
  io.output.on('resize', onResize);
  process.once('SIGINT', onSignal);
  io.output.write(HIDE_CURSOR);

  try {
    while (!store.getState().stopped) {
      await store.getState().tick();
      const state = store.getState();
      const rows = Math.max(3, (io.output.rows ?? 24) - RESERVED_ROWS - (state.graph?.endpoints.length ?? 0));
      io.output.write(CLEAR_SCREEN + formatFrame(state, rows).join('\n') + '\n');
      if (state.stopped) break;
      await wait(state.refresh.uiIntervalMs);
    }
  } finally {
    io.input.off('keypress', onKeypress);
    io.output.off('resize', onResize);
    process.off('SIGINT', onSignal);
    if (io.input.isTTY && io.input.setRawMode) io.input.setRawMode(false);
    io.input.pause();
    io.output.write(SHOW_CURSOR);
  }
}

export const watchCommand = new Command('watch')
  .description('Live connection topology view')
  .option('-p, --pid <pid>', 'Start focused on this process')
  .option('--ui-interval <ms>', `Redraw interval (${UI_INTERVAL.minMs}-${UI_INTERVAL.maxMs})`)
  .option('--scan-interval <ms>', `Rescan interval (${SCAN_INTERVAL.minMs}-${SCAN_INTERVAL.maxMs})`)
  .option('--rules <file>', 'Suspicion rule file (JSON)')
  .action(async (_options: unknown, command: Command) => {
    const all = command.optsWithGlobals();
    const options = parseOptions(WatchOptionsSchema, all);
    const context = await createContext(parseOptions(GlobalOptionsSchema, all), options.rules);
    await runWatch(options, context, { input: process.stdin, output: process.stdout });
  });
