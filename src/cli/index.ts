#!/usr/bin/env node
/**
 * Closure Scan CLI
 *
 * Main entry point for the closure-scan tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   closure-scan --help
 *   closure-scan scan --city "Santa Cruz"
 *   closure-scan scan --all
 *   closure-scan count --city Medellin
 *
 * @module cli
 */

import { Command } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  // Program metadata
  program
    .name('closure-scan')
    .description('Find newly temporarily-closed businesses and append them to per-city ledgers')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output')
    .option('--data-dir <path>', 'Override default data directory (~/.closure-scan)');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts: GlobalOptions = thisCommand.opts();
    const baseCommand = new BaseCommand(opts);

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', baseCommand);

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      baseCommand.error('Cannot use both --verbose and --quiet flags', EXIT_CODES.USAGE_ERROR);
    }
  });

  // Register all subcommands
  registerCommands(program);

  return program;
}

/**
 * Main CLI entry point.
 * Parses arguments and executes the appropriate command.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv);
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(EXIT_CODES.ERROR);
  });
}
