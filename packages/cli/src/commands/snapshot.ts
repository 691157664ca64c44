/**
 * Snapshot Command - sockgraph snapshot
 *
 * One scan, correlate and aggregate pass, printed as text or JSON.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import {
  buildGraph,
  createProcfsSource,
  Errors,
  severityOf,
  type Connection,
  type ConnectionSource,
  type Severity,
} from 'sockgraph-core';

import { createContext, GlobalOptionsSchema, intOption, parseOptions, type CommandContext } from './context.js';
import { formatConnection, formatGraph, severityBadge, visibilityNotice } from '../ui/format.js';

export const SnapshotOptionsSchema = z.object({
  pid: intOption(1).optional(),
  limit: intOption(1).optional(),
  format: z.enum(['text', 'json']).default('text'),
  rules: z.string().min(1).optional(),
});

export type SnapshotOptions = z.infer<typeof SnapshotOptionsSchema>;

export interface SnapshotIO {
  /** Defaults to the live kernel source */
  source?: ConnectionSource;
  write: (text: string) => void;
  hostLabel?: string;
}

interface SuspiciousConnection {
  connection: Connection;
  ruleIds: string[];
  severity: Severity | null;
}

export async function runSnapshot(options: SnapshotOptions, context: CommandContext, io: SnapshotIO): Promise<void> {
  const { config, logger, ruleSet } = context;
  const source = io.source ?? createProcfsSource(config, logger);

  const snapshot = await source.collect();
  const build = buildGraph(snapshot.connections, {
    ruleSet,
    focusPid: options.pid ?? null,
    maxVisible: options.limit ?? config.maxVisibleEndpoints,
    latencyThresholds: config.latency,
    ...(io.hostLabel !== undefined ? { hostLabel: io.hostLabel } : {}),
  });

  if (options.pid !== undefined && build.connections.length === 0) {
    throw Errors.processNotFound(options.pid);
  }

  const suspicious: SuspiciousConnection[] = [];
  build.connections.forEach((connection, index) => {
    const ruleIds = [...(build.classifications[index]?.ruleIds ?? [])].sort();
    if (ruleIds.length > 0) {
      suspicious.push({ connection, ruleIds, severity: severityOf(ruleIds, ruleSet) });
    }
  });
  const listed = suspicious.slice(0, config.listCeiling);

  if (options.format === 'json') {
    io.write(
      JSON.stringify(
        {
          center: build.graph.center,
          visibility: snapshot.visibility,
          summary: build.graph.summary,
          endpoints: build.graph.endpoints,
          dropped: build.graph.dropped,
          suspicious: listed.map(({ connection, ruleIds, severity }) => ({ ...connection, ruleIds, severity })),
          diagnostics: context.diagnostics,
        },
        null,
        2
      )
    );
    return;
  }

  const notice = visibilityNotice(snapshot.visibility);
  if (notice) io.write(notice);
  for (const line of formatGraph(build.graph)) io.write(line);

  if (listed.length > 0) {
    io.write('');
    io.write(chalk.bold('Suspicious connections'));
    for (const { connection, ruleIds, severity } of listed) {
      io.write(`${severityBadge(severity)} ${formatConnection(connection)}  ${ruleIds.join(', ')}`);
    }
    if (suspicious.length > listed.length) {
      io.write(chalk.gray(`... ${suspicious.length - listed.length} more`));
    }
  }
}

export const snapshotCommand = new Command('snapshot')
  .description('Scan once and print the connection topology')
  .option('-p, --pid <pid>', 'Only connections owned by this process')
  .option('-l, --limit <count>', 'Maximum endpoints to show')
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .option('--rules <file>', 'Suspicion rule file (JSON)')
  .action(async (_options: unknown, command: Command) => {
    const all = command.optsWithGlobals();
    const options = parseOptions(SnapshotOptionsSchema, all);
    const context = await createContext(parseOptions(GlobalOptionsSchema, all), options.rules);
    await runSnapshot(options, context, { write: (text) => console.log(text) });
  });
