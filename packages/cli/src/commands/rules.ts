/**
 * Rules Command - sockgraph rules
 *
 * Inspect the active suspicion rules and validate rule files.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import { Errors, loadRuleSet, type Logger, type RuleSet } from 'sockgraph-core';

import { createContext, GlobalOptionsSchema, parseOptions } from './context.js';
import { severityBadge } from '../ui/format.js';

const FormatOptionsSchema = z.object({
  format: z.enum(['text', 'json']).default('text'),
  rules: z.string().min(1).optional(),
});

type OutputFormat = z.infer<typeof FormatOptionsSchema>['format'];

export function listRules(ruleSet: RuleSet, format: OutputFormat, write: (text: string) => void): void {
  if (format === 'json') {
    write(JSON.stringify(ruleSet, null, 2));
    return;
  }

  write(chalk.bold(`${ruleSet.rules.length} rule(s), version ${ruleSet.version}`));
  for (const rule of ruleSet.rules) {
    const tags = rule.tags.length > 0 ? chalk.gray(` (${rule.tags.join(', ')})`) : '';
    write(`${severityBadge(rule.severity)} ${rule.id}: ${rule.name}${tags}`);
    if (rule.description) write(chalk.gray(`    ${rule.description}`));
  }
}

/**
 * Validate a rule file, throwing RULESET_INVALID when anything was dropped
 */
export async function checkRules(file: string, logger: Logger, write: (text: string) => void): Promise<RuleSet> {
  const result = await loadRuleSet(file, logger);
  if (result.diagnostics.length > 0) {
    for (const diagnostic of result.diagnostics) {
      write(chalk.red(`  ✗ ${diagnostic.message}`));
    }
    throw Errors.invalidRuleSet(file, result.diagnostics);
  }
  write(chalk.green(`✓ ${file}: ${result.ruleSet.rules.length} valid rule(s)`));
  return result.ruleSet;
}

export const rulesCommand = new Command('rules').description('Inspect and validate suspicion rules');

rulesCommand
  .command('list', { isDefault: true })
  .description('List the active rules')
  .option('-f, --format <format>', 'Output format (text, json)', 'text')
  .option('--rules <file>', 'Rule file to list instead of the configured one')
  .action(async (_options: unknown, command: Command) => {
    const all = command.optsWithGlobals();
    const options = parseOptions(FormatOptionsSchema, all);
    const context = await createContext(parseOptions(GlobalOptionsSchema, all), options.rules);
    listRules(context.ruleSet, options.format, (text) => console.log(text));
  });

rulesCommand
  .command('check <file>')
  .description('Validate a rule file')
  .action(async (file: string, _options: unknown, command: Command) => {
    const context = await createContext(parseOptions(GlobalOptionsSchema, command.optsWithGlobals()));
    await checkRules(file, context.logger, (text) => console.log(text));
  });
