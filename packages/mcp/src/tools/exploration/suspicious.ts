/**
 * sockgraph_suspicious - Connections matching suspicion rules
 *
 * Each flagged connection with the rule ids it matched, the highest
 * severity among them, the union of their tags, the reason each rule gave
 * and follow-up steps picked by tag. Most severe first.
 */

import { z } from 'zod';
import {
  analyzeConnection,
  buildRuleContext,
  compareSeverity,
  SEVERITY_RANK,
  SeveritySchema,
  type Severity,
} from 'sockgraph-core';

import { createResponseBuilder, parseArgs, type ToolContent } from '../../infrastructure/index.js';
import { collect, toConnectionView, warnOnVisibility, type ConnectionView, type ToolContext } from '../context.js';
import { investigationSteps, matchReasons, type MatchReason } from './investigation.js';

export const SuspiciousArgsSchema = z
  .object({
    minSeverity: SeveritySchema.optional(),
    limit: z.number().int().positive().optional(),
  })
  .strict();

export interface SuspiciousConnection extends ConnectionView {
  ruleIds: string[];
  severity: Severity;
  tags: string[];
  reasons: MatchReason[];
  investigation: string[];
}

export interface SuspiciousData {
  total: number;
  bySeverity: Record<Severity, number>;
  connections: SuspiciousConnection[];
}

export async function handleSuspicious(context: ToolContext, args: unknown): Promise<ToolContent> {
  const input = parseArgs(SuspiciousArgsSchema, args);
  const builder = createResponseBuilder<SuspiciousData>();

  const { snapshot, build } = await collect(context);
  const ruleContext = buildRuleContext(build.connections);
  const threshold = input.minSeverity ? SEVERITY_RANK[input.minSeverity] : 0;

  const flagged: SuspiciousConnection[] = [];
  for (const connection of build.connections) {
    const analysis = analyzeConnection(connection, context.ruleSet, ruleContext);
    if (analysis.severity === null || SEVERITY_RANK[analysis.severity] < threshold) continue;
    const matched = context.ruleSet.rules.filter((rule) => analysis.ruleIds.has(rule.id));
    flagged.push({
      ...toConnectionView(connection),
      ruleIds: [...analysis.ruleIds].sort(),
      severity: analysis.severity,
      tags: [...analysis.tags],
      reasons: matchReasons(matched),
      investigation: investigationSteps(connection.pid, analysis.tags),
    });
  }
  // Stable: scan order is kept within a severity
  flagged.sort((a, b) => compareSeverity(b.severity, a.severity));

  const bySeverity: Record<Severity, number> = { low: 0, medium: 0, high: 0, critical: 0 };
  for (const entry of flagged) bySeverity[entry.severity]++;

  const connections = flagged.slice(0, input.limit ?? context.config.listCeiling);

  warnOnVisibility(builder, snapshot.visibility);
  if (context.ruleSet.rules.length === 0) {
    builder.addWarning('No suspicion rules are loaded.');
  }

  return builder
    .withSummary(
      flagged.length === 0
        ? 'No connections matched any suspicion rule'
        : `${flagged.length} suspicious connection(s); most severe: ${flagged[0]?.severity ?? 'none'}`
    )
    .withData({ total: flagged.length, bySeverity, connections })
    .withTruncation(connections.length, flagged.length)
    .withRelatedTools(['sockgraph_processes', 'sockgraph_connections'])
    .buildContent();
}
