/**
 * Count Command
 *
 * One probe per operating status over the configured categories. Nothing is
 * fetched or written.
 *
 * @module cli/commands/count
 */

import { Command } from 'commander';
import { getConfig } from '../../config/index.js';
import { getBaseCommand } from '../base-command.js';
import { loadCommandControls } from './options.js';
import { reportCounts } from './scan.js';

export interface CountOptions {
  city?: string;
  config?: string;
}

export function registerCountCommand(program: Command): void {
  program
    .command('count')
    .description('Count places per operating status without fetching them')
    .option('-c, --city <name>', 'City to count (default: cityName from controls)')
    .option('--config <path>', 'Controls file (default: <data-dir>/controls.json)')
    .action(async (options: CountOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(async () => {
        const controls = await loadCommandControls(base, options.config);
        await reportCounts(getConfig(), controls, options.city ?? controls.cityName, base);
      });
    });
}
