/**
 * Scan Command
 *
 * Places mode for one city or every configured city. In count mode the same
 * command reports per-status counts instead.
 *
 * @module cli/commands/scan
 */

import { Command } from 'commander';
import { getConfig, type Config } from '../../config/index.js';
import type { ScanControls } from '../../config/controls.js';
import { runAllCities, runCount, runSingleCity } from '../../pipeline/runner.js';
import { getBaseCommand, UsageError, type BaseCommand } from '../base-command.js';
import { CityProgressDisplay } from '../formatters/progress.js';
import {
  formatCityResult,
  formatMultiCitySummary,
  formatStatusCounts,
} from '../formatters/run-summary.js';
import { createInsightsClient, createScanServices } from '../services.js';
import { loadCommandControls, parseStrategy } from './options.js';

// ============================================================================
// Types
// ============================================================================

export interface ScanOptions {
  /** City to scan (default: controls cityName) */
  city?: string;
  /** Scan every city in citiesList */
  all?: boolean;
  /** Ledger tab (default: RAW_TAB, then the city's preset tab) */
  tab?: string;
  /** Controls file */
  config?: string;
  /** Prepare rows without writing to the ledger */
  dryRun?: boolean;
  /** Fetch strategy override */
  strategy?: string;
}

// ============================================================================
// Command Registration
// ============================================================================

export function registerScanCommand(program: Command): void {
  program
    .command('scan')
    .description('Scan for temporarily closed businesses and append new ones to the ledger')
    .option('-c, --city <name>', 'City to scan (default: cityName from controls)')
    .option('-a, --all', 'Scan every city in citiesList, then send the summary email')
    .option('-t, --tab <name>', 'Ledger tab to append to (must end with _Raw)')
    .option('--config <path>', 'Controls file (default: <data-dir>/controls.json)')
    .option('--dry-run', 'Resolve and prepare rows without writing to the ledger')
    .option('--strategy <name>', 'Fetch strategy: binary-backoff, exhaustive')
    .action(async (options: ScanOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      await base.run(() => handleScan(options, base));
    });
}

// ============================================================================
// Handlers
// ============================================================================

async function handleScan(options: ScanOptions, base: BaseCommand): Promise<void> {
  if (options.all && (options.city || options.tab)) {
    throw new UsageError('--all cannot be combined with --city or --tab');
  }

  const config = getConfig();
  const controls = await loadCommandControls(base, options.config, {
    fetchStrategy: parseStrategy(options.strategy),
    writeEnabled: options.dryRun ? false : undefined,
  });

  if (controls.mode === 'count') {
    const cities = options.all ? controls.citiesList : [options.city ?? controls.cityName];
    for (const city of cities) {
      await reportCounts(config, controls, city, base);
    }
    return;
  }

  if (options.all) {
    await scanAllCities(config, controls, base);
    return;
  }

  const services = await createScanServices({
    config,
    controls,
    dataDir: base.dataDir,
    logger: base.logger(),
  });
  const result = await runSingleCity(controls, services, {
    city: options.city,
    tab: options.tab ?? config.settings.rawTab,
  });

  base.blank();
  base.info(formatCityResult(result));
}

async function scanAllCities(
  config: Config,
  controls: Readonly<ScanControls>,
  base: BaseCommand
): Promise<void> {
  const services = await createScanServices({
    config,
    controls,
    dataDir: base.dataDir,
    logger: base.logger(),
  });
  const progress = new CityProgressDisplay(controls.citiesList, { spinner: base.isQuiet() });
  let current: string | undefined;

  try {
    const result = await runAllCities(controls, services, {
      recipients: config.emailRecipients,
      sheetLink: config.settings.sheetLink ?? '',
      onCityStart: (city) => {
        current = city;
        progress.startCity(city);
      },
      onCityDone: (city) => {
        progress.completeCity(city.city, city.rowsAppended, city.durationMs);
      },
    });

    base.blank();
    base.info(formatMultiCitySummary(result, controls.notify.enabled));
  } catch (error) {
    if (current) {
      progress.failCity(current, error instanceof Error ? error.message : String(error));
    }
    throw error;
  }
}

/**
 * Probe each operating status for one city and print the counts.
 */
export async function reportCounts(
  config: Config,
  controls: Readonly<ScanControls>,
  city: string,
  base: BaseCommand
): Promise<void> {
  const logger = base.logger();
  const insights = createInsightsClient({ config, controls, dataDir: base.dataDir, logger });
  const counts = await runCount(controls, { insights, logger }, { city });

  base.blank();
  base.info(formatStatusCounts(city, counts));
}
