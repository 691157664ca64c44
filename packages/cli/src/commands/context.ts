/**
 * Shared command plumbing: option validation and the per-invocation
 * context (configuration, logger, rules) every command starts from.
 */

import { z } from 'zod';
import {
  createLogger,
  Errors,
  loadMonitorConfig,
  loadRuleSet,
  type Diagnostic,
  type Logger,
  type MonitorConfig,
  type RuleSet,
} from 'sockgraph-core';

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  color: z.boolean().optional(),
  config: z.string().min(1).optional(),
  procRoot: z.string().min(1).optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CommandContext {
  config: MonitorConfig;
  logger: Logger;
  ruleSet: RuleSet;
  diagnostics: Diagnostic[];
}

/**
 * Validate Commander option values against a schema. Failures become
 * INVALID_ARGUMENT errors naming the offending flag.
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const flag = issue && issue.path.length > 0 ? `--${issue.path.join('.')}` : 'options';
    throw Errors.invalidArgument(flag, issue?.message ?? 'invalid value');
  }
  return parsed.data;
}

/**
 * Integer-valued flag, given as a string on the command line
 */
export const intOption = (min: number) => z.coerce.number().int().min(min);

export async function createContext(globals: GlobalOptions, rulesPath?: string): Promise<CommandContext> {
  const loaded = await loadMonitorConfig(globals.config !== undefined ? { configPath: globals.config } : {});
  const config: MonitorConfig = {
    ...loaded.config,
    ...(globals.procRoot !== undefined ? { procRoot: globals.procRoot } : {}),
  };

  const logger = createLogger({ level: globals.verbose ? 'debug' : config.logLevel, name: 'sockgraph' });
  for (const diagnostic of loaded.diagnostics) {
    logger.warn(`${diagnostic.source}: ${diagnostic.message}`);
  }

  const rules = await loadRuleSet(rulesPath ?? config.rulesPath, logger);

  return {
    config,
    logger,
    ruleSet: rules.ruleSet,
    diagnostics: [...loaded.diagnostics, ...rules.diagnostics],
  };
}
