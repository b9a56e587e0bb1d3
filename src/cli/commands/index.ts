/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - scan: Places mode for one city or all cities
 * - count: Per-status counts
 * - notify-test: Send the summary email once
 * - ledger-test: Append a placeholder row
 * - cities: List city presets
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerCitiesCommand } from './cities.js';
import { registerCountCommand } from './count.js';
import { registerLedgerTestCommand } from './ledger-test.js';
import { registerNotifyTestCommand } from './notify-test.js';
import { registerScanCommand } from './scan.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerScanCommand(program);
  registerCountCommand(program);
  registerNotifyTestCommand(program);
  registerLedgerTestCommand(program);
  registerCitiesCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'scan [--city <name>] [--tab <name>]', description: 'Scan one city and append new rows' },
    { name: 'scan --all', description: 'Scan every configured city, then email the summary' },
    { name: 'count [--city <name>]', description: 'Count places per operating status' },
    { name: 'notify-test [--counts <list>]', description: 'Send the summary email with sample counts' },
    { name: 'ledger-test [--tab <name>]', description: 'Append a placeholder row to a _Raw tab' },
    { name: 'cities', description: 'List the city presets' },
  ];
}
