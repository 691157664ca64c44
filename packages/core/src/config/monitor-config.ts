/**
 * Monitor configuration
 *
 * Read from .sockgraph/config.json (or an explicit path), validated with
 * zod, then overlaid with environment overrides. Loading never throws:
 * problems come back as diagnostics next to the defaults.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';

import { resolveLogLevel } from '../infrastructure/logger.js';
import { DEFAULT_PROC_ROOT } from '../scanner/socket-scanner.js';
import { LIST_CEILING, MAX_VISIBLE_ENDPOINTS } from '../topology/aggregator.js';
import { DEFAULT_LATENCY_THRESHOLDS } from '../classifier/latency.js';
import { SCAN_INTERVAL, UI_INTERVAL } from '../monitor/refresh-config.js';

import { describeFsError, type Diagnostic } from '../errors/sockgraph-error.js';

export const CONFIG_DIR = '.sockgraph';
export const CONFIG_FILE = 'config.json';

const LatencySchema = z
  .object({
    lowThresholdMs: z.number().nonnegative().default(DEFAULT_LATENCY_THRESHOLDS.lowThresholdMs),
    highThresholdMs: z.number().nonnegative().default(DEFAULT_LATENCY_THRESHOLDS.highThresholdMs),
  })
  .strict()
  .refine((latency) => latency.lowThresholdMs < latency.highThresholdMs, {
    message: 'lowThresholdMs must be below highThresholdMs',
  });

const RefreshSchema = z
  .object({
    uiIntervalMs: z.number().int().min(UI_INTERVAL.minMs).max(UI_INTERVAL.maxMs).default(UI_INTERVAL.defaultMs),
    scanIntervalMs: z
      .number()
      .int()
      .min(SCAN_INTERVAL.minMs)
      .max(SCAN_INTERVAL.maxMs)
      .default(SCAN_INTERVAL.defaultMs),
  })
  .strict();

export const MonitorConfigSchema = z
  .object({
    procRoot: z.string().min(1).default(DEFAULT_PROC_ROOT),
    protocols: z.array(z.enum(['tcp', 'udp'])).min(1).default(['tcp', 'udp']),
    includeIpv6: z.boolean().default(true),
    rulesPath: z.string().min(1).optional(),
    maxVisibleEndpoints: z.number().int().min(1).default(MAX_VISIBLE_ENDPOINTS),
    listCeiling: z.number().int().min(1).default(LIST_CEILING),
    latency: LatencySchema.default({}),
    refresh: RefreshSchema.default({}),
    correlationBudgetMs: z.number().int().positive().optional(),
    logLevel: z.enum(['error', 'warn', 'info', 'debug']).default('warn'),
  })
  .strict();

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

export const DEFAULT_CONFIG: MonitorConfig = MonitorConfigSchema.parse({});

export interface LoadConfigOptions {
  /** Directory holding .sockgraph/ (default process.cwd()) */
  cwd?: string;
  /** Explicit file; a missing explicit file is a diagnostic */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ConfigLoadResult {
  config: MonitorConfig;
  diagnostics: Diagnostic[];
  /** File the values came from, null when defaults were used */
  source: string | null;
}

function applyEnvironment(config: MonitorConfig, env: NodeJS.ProcessEnv): MonitorConfig {
  const procRoot = env['SOCKGRAPH_PROC_ROOT'];
  return {
    ...config,
    ...(procRoot ? { procRoot } : {}),
    logLevel: resolveLogLevel(config.logLevel, env),
  };
}

async function readConfigFile(
  filePath: string,
  explicit: boolean
): Promise<{ config: MonitorConfig | null; diagnostics: Diagnostic[] }> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    if (missing && !explicit) {
      return { config: null, diagnostics: [] };
    }
    return { config: null, diagnostics: [{ source: filePath, message: `cannot read: ${describeFsError(error)}` }] };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { config: null, diagnostics: [{ source: filePath, message: `invalid JSON: ${reason}` }] };
  }

  const parsed = MonitorConfigSchema.safeParse(json);
  if (!parsed.success) {
    return {
      config: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        source: filePath,
        message: `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`,
      })),
    };
  }

  return { config: parsed.data, diagnostics: [] };
}

export async function loadMonitorConfig(options: LoadConfigOptions = {}): Promise<ConfigLoadResult> {
  const env = options.env ?? process.env;
  const explicit = options.configPath !== undefined;
  const filePath = options.configPath ?? path.join(options.cwd ?? process.cwd(), CONFIG_DIR, CONFIG_FILE);

  const { config, diagnostics } = await readConfigFile(filePath, explicit);

  return {
    config: applyEnvironment(config ?? DEFAULT_CONFIG, env),
    diagnostics,
    source: config ? filePath : null,
  };
}
