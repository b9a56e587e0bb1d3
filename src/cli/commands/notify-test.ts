/**
 * Notify Test Command
 *
 * Sends the summary email once with given or zero counts, without scanning.
 *
 * @module cli/commands/notify-test
 */

import { Command } from 'commander';
import { ConfigurationError, getConfig } from '../../config/index.js';
import type { CityCounts } from '../../notify/types.js';
import { getBaseCommand, type BaseCommand } from '../base-command.js';
import { createNotifier } from '../services.js';
import { loadCommandControls, parseCityCounts } from './options.js';

export interface NotifyTestOptions {
  /** `City=N,...`; defaults to 0 for every city in citiesList */
  counts?: string;
  config?: string;
}

export function registerNotifyTestCommand(program: Command): void {
  program
    .command('notify-test')
    .description('Send the summary email with sample counts')
    .option('--counts <list>', 'Per-city counts, e.g. "Chattanooga=3,Santa Cruz=1"')
    .option('--config <path>', 'Controls file (default: <data-dir>/controls.json)')
    .action(async (options: NotifyTestOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(() => handleNotifyTest(options, base));
    });
}

async function handleNotifyTest(options: NotifyTestOptions, base: BaseCommand): Promise<void> {
  const config = getConfig();
  const controls = await loadCommandControls(base, options.config);

  const counts: CityCounts = options.counts
    ? parseCityCounts(options.counts)
    : Object.fromEntries(controls.citiesList.map((city): [string, number] => [city, 0]));

  if (config.emailRecipients.length === 0) {
    throw new ConfigurationError(
      'Missing required setting: EMAIL_RECIPIENTS. Please set it in your .env file.'
    );
  }

  const notifier = await createNotifier(config, base.logger());
  await notifier.send(config.emailRecipients, counts, config.settings.sheetLink ?? '');

  base.success(`Test email sent to ${config.emailRecipients.join(', ')}`);
}
