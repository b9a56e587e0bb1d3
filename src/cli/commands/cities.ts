/**
 * Cities Command
 *
 * Lists the city presets.
 *
 * @module cli/commands/cities
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { CITY_PRESETS, type CityPreset } from '../../config/cities.js';
import { getBaseCommand } from '../base-command.js';

export interface CitiesOptions {
  format?: 'table' | 'json';
}

/**
 * Pad a string to a fixed width.
 */
function padRight(str: string, width: number): string {
  return str + ' '.repeat(Math.max(0, width - str.length));
}

export function formatCityRow(preset: CityPreset): string {
  const center = `${preset.center.lat.toFixed(4)}, ${preset.center.lng.toFixed(4)}`;
  return padRight(preset.name, 16) + padRight(center, 24) + preset.tab;
}

export function formatCitiesTable(presets: readonly CityPreset[]): string {
  const header = chalk.bold(padRight('CITY', 16) + padRight('CENTER', 24) + 'TAB');
  return [header, chalk.dim('-'.repeat(56)), ...presets.map(formatCityRow)].join('\n');
}

export function registerCitiesCommand(program: Command): void {
  program
    .command('cities')
    .description('List the city presets')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action((options: CitiesOptions, cmd: Command) => {
      const base = getBaseCommand(cmd.parent ?? cmd);
      const presets = Object.values(CITY_PRESETS);

      if (options.format === 'json') {
        base.json(presets);
        return;
      }
      base.info(formatCitiesTable(presets));
    });
}
