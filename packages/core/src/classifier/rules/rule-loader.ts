/**
 * Rule Loader
 *
 * Reads and validates rule files. Never throws: a missing, unreadable or
 * invalid file yields whatever rules did validate (possibly none) plus
 * diagnostics describing what was dropped.
 */

import * as fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { silentLogger, type Logger } from '../../infrastructure/logger.js';
import { RuleSchema, RuleSetEnvelopeSchema } from './rule-schema.js';
import { EMPTY_RULE_SET, type Rule, type RuleSet } from './types.js';

import { describeFsError, type Diagnostic } from '../../errors/sockgraph-error.js';
import type { ZodIssue } from 'zod';

export interface RuleSetLoadResult {
  ruleSet: RuleSet;
  diagnostics: Diagnostic[];
  /** File the rules came from */
  source: string;
}

/**
 * Rules shipped with the package
 */
export const DEFAULT_RULES_PATH = fileURLToPath(new URL('../../../rules/default-rules.json', import.meta.url));

function formatIssue(issue: ZodIssue): string {
  const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${where}: ${issue.message}`;
}

/**
 * Validate already-parsed JSON
 */
export function parseRuleSet(input: unknown, source = '<inline>'): Omit<RuleSetLoadResult, 'source'> {
  const envelope = RuleSetEnvelopeSchema.safeParse(input);
  if (!envelope.success) {
    return {
      ruleSet: EMPTY_RULE_SET,
      diagnostics: envelope.error.issues.map((issue) => ({ source, message: formatIssue(issue) })),
    };
  }

  const rules: Rule[] = [];
  const diagnostics: Diagnostic[] = [];
  const seen = new Set<string>();

  envelope.data.rules.forEach((candidate, index) => {
    const parsed = RuleSchema.safeParse(candidate);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        diagnostics.push({ source, message: `rules.${index}.${formatIssue(issue)}` });
      }
      return;
    }

    if (seen.has(parsed.data.id)) {
      diagnostics.push({ source, message: `rules.${index}: duplicate rule id '${parsed.data.id}'` });
      return;
    }

    seen.add(parsed.data.id);
    rules.push(parsed.data);
  });

  return { ruleSet: { version: envelope.data.version, rules }, diagnostics };
}

/**
 * Load a rule file, defaulting to the bundled rules
 */
export async function loadRuleSet(filePath?: string, logger: Logger = silentLogger): Promise<RuleSetLoadResult> {
  const source = filePath ?? DEFAULT_RULES_PATH;

  let raw: string;
  try {
    raw = await fs.readFile(source, 'utf-8');
  } catch (error) {
    const message = `cannot read rule file: ${describeFsError(error)}`;
    logger.warn(`${source}: ${message}; continuing with no rules`);
    return { ruleSet: EMPTY_RULE_SET, diagnostics: [{ source, message }], source };
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    const message = `invalid JSON: ${error instanceof Error ? error.message : String(error)}`;
    logger.warn(`${source}: ${message}; continuing with no rules`);
    return { ruleSet: EMPTY_RULE_SET, diagnostics: [{ source, message }], source };
  }

  const result = parseRuleSet(json, source);
  for (const diagnostic of result.diagnostics) {
    logger.warn(`${diagnostic.source}: ${diagnostic.message}`);
  }
  logger.debug(`Loaded ${result.ruleSet.rules.length} rule(s) from ${source}`);

  return { ...result, source };
}
