/**
 * Run Summary Formatters
 *
 * CLI output formatters for scan results:
 * - Single-city scan summary
 * - All-cities summary with notification status
 * - Count mode summary
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import { ALL_OPERATING_STATUSES } from '../../schemas/insights.js';
import type {
  CityScanResult,
  MultiCityResult,
  ScanStopReason,
  StatusCounts,
} from '../../pipeline/types.js';
import { formatDuration } from './progress.js';

const STOP_REASON_LABELS: Record<ScanStopReason, string> = {
  'no-details': 'no place details resolved',
  'no-rows': 'no rows matched the status filter',
  'write-disabled': 'ledger writes disabled',
  'no-ledger': 'no ledger configured',
  'all-duplicates': 'every row already in the ledger',
};

/**
 * Format one city's scan.
 *
 * @example
 * ```
 * === Scan Complete ===
 * City:     Santa Cruz
 * Tab:      SantaCruz_Raw
 * Duration: 5.3s
 *
 * Insights found:   42
 * Details resolved: 40
 * Rows prepared:    38
 * Rows appended:    12
 * Snapshot:         /home/me/.closure-scan/snapshots/Santa_Cruz_snapshot_2026-W42.csv
 * ```
 */
export function formatCityResult(result: CityScanResult): string {
  const lines: string[] = [];

  lines.push(chalk.bold('=== Scan Complete ==='));
  lines.push(`City:     ${chalk.cyan(result.city)}`);
  lines.push(`Tab:      ${chalk.cyan(result.tab)}`);
  lines.push(`Duration: ${formatDuration(result.durationMs)}`);
  lines.push('');
  lines.push(`Insights found:   ${result.insightsFound}`);
  lines.push(`Details resolved: ${result.detailsResolved}`);
  lines.push(`Rows prepared:    ${result.rowsPrepared}`);
  lines.push(`Rows appended:    ${result.rowsAppended}`);

  if (result.snapshotPath) {
    lines.push(`Snapshot:         ${result.snapshotPath}`);
  }
  if (result.stopReason) {
    lines.push(chalk.yellow(`Stopped:          ${STOP_REASON_LABELS[result.stopReason]}`));
  }

  return lines.join('\n');
}

/**
 * Format an all-cities run: one line per city, the total, and whether the
 * summary email went out.
 */
export function formatMultiCitySummary(result: MultiCityResult, notifyEnabled: boolean): string {
  const lines: string[] = [];
  const total = Object.values(result.newRowsByCity).reduce((sum, count) => sum + count, 0);

  lines.push(chalk.bold('=== All Cities Complete ==='));
  for (const city of result.cities) {
    const reason = city.stopReason ? chalk.dim(` (${STOP_REASON_LABELS[city.stopReason]})`) : '';
    lines.push(`  ${city.city}: ${city.rowsAppended} new${reason}`);
  }
  lines.push('');
  lines.push(`Total new: ${total}`);

  if (notifyEnabled) {
    lines.push(`Email:     ${result.notified ? chalk.green('sent') : chalk.yellow('not sent')}`);
  }

  return lines.join('\n');
}

/**
 * Format count mode: one line per operating status, in reporting order.
 */
export function formatStatusCounts(city: string, counts: StatusCounts): string {
  const lines = [chalk.bold(`=== Counts for ${city} ===`)];
  for (const status of ALL_OPERATING_STATUSES) {
    lines.push(`  ${status}: ${counts[status] ?? 0}`);
  }
  return lines.join('\n');
}
