/**
 * Ledger Test Command
 *
 * Appends one placeholder row to a `_Raw` tab to check credentials and access.
 *
 * @module cli/commands/ledger-test
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { getCityPreset } from '../../config/cities.js';
import { assertRawTab } from '../../ledger/types.js';
import { placeholderRow } from '../../places/mapper.js';
import { LEDGER_HEADERS } from '../../schemas/ledger.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { createSpinner } from '../formatters/progress.js';
import { createLedger } from '../services.js';
import { loadCommandControls } from './options.js';

export interface LedgerTestOptions {
  /** Target tab (default: RAW_TAB, then the controls city's tab) */
  tab?: string;
}

export function registerLedgerTestCommand(program: Command): void {
  program
    .command('ledger-test')
    .description('Append a placeholder row to a _Raw tab')
    .option('-t, --tab <name>', 'Ledger tab (must end with _Raw)')
    .action(async (options: LedgerTestOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(() => handleLedgerTest(options, base));
    });
}

async function handleLedgerTest(options: LedgerTestOptions, base: BaseCommand): Promise<void> {
  const config = getConfig();
  const tab =
    options.tab?.trim() ||
    config.settings.rawTab ||
    getCityPreset((await loadCommandControls(base, undefined)).cityName).tab;

  assertRawTab(tab);
  const ledger = createLedger(config, base.logger());

  const spinner = createSpinner(`Appending placeholder row to '${tab}'`).start();
  try {
    const ledgerTab = await ledger.ensureTab(tab, LEDGER_HEADERS);
    await ledgerTab.appendRows([placeholderRow()]);
    spinner.succeed(`Appended placeholder row to '${tab}'`);
  } catch (error) {
    spinner.fail(`Append to '${tab}' failed`);
    throw error;
  }
}
