#!/usr/bin/env node
/**
 * sockgraph CLI Entry Point
 *
 * Sets up Commander.js with all available commands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { SockgraphError } from 'sockgraph-core';

import { VERSION } from '../index.js';
import { rulesCommand, snapshotCommand, watchCommand } from '../commands/index.js';

/**
 * Create and configure the main CLI program
 */
function createProgram(): Command {
  const program = new Command();

  program
    .name('sockgraph')
    .description('Live, process-aware view of the host network connections')
    .version(VERSION, '-v, --version', 'Output the current version')
    .option('--verbose', 'Enable verbose output')
    .option('--no-color', 'Disable colored output')
    .option('-c, --config <path>', 'Configuration file (default .sockgraph/config.json)')
    .option('--proc-root <path>', 'Root of the process filesystem (default /proc)')
    .hook('preAction', (thisCommand) => {
      if (thisCommand.opts()['color'] === false) {
        chalk.level = 0;
      }
    });

  // Register all commands
  program.addCommand(watchCommand, { isDefault: true });
  program.addCommand(snapshotCommand);
  program.addCommand(rulesCommand);

  // Add help examples
  program.addHelpText(
    'after',
    `
Examples:
  $ sockgraph                            Live view of all connections
  $ sockgraph watch --pid 1234           Live view focused on one process
  $ sockgraph watch --scan-interval 5000 Rescan every five seconds
  $ sockgraph snapshot                   Print one snapshot
  $ sockgraph snapshot --format json     Snapshot as JSON
  $ sockgraph snapshot --limit 20        Show up to 20 endpoints
  $ sockgraph rules                      List the active suspicion rules
  $ sockgraph rules check my-rules.json  Validate a rule file

Keys (watch):
  q / Esc    quit            ↑ / ↓    select connection
  p          focus process   r        rescan now
  + / -      redraw speed    ] / [    scan speed
`
  );

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      console.error(`Error: ${error.message}`);
      if (error instanceof SockgraphError && error.recovery) {
        console.error(chalk.gray(error.recovery.suggestion));
      }
      if (process.env['DEBUG']) {
        console.error(error.stack);
      }
    } else {
      console.error('An unexpected error occurred');
    }
    process.exit(1);
  }
}

// Run the CLI
void main();
