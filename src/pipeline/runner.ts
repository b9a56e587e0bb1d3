/**
 * Scan Runner
 *
 * Single-city and all-cities orchestration. All-cities runs build every city's
 * context up front, so an unknown city or a bad tab stops the run before the
 * first remote call. Cities are then scanned strictly one after another, and the
 * notifier runs once at the end.
 *
 * @module pipeline/runner
 */

import type { ScanControls } from '../config/controls.js';
import { buildRunContext } from './context.js';
import { countByStatus, scanCity } from './scan.js';
import type { CityScanResult, MultiCityResult, ScanServices, StatusCounts } from './types.js';

export interface SingleCityOptions {
  /** City to scan (default: `controls.cityName`) */
  city?: string;
  /** Ledger tab override */
  tab?: string;
  now?: Date;
}

export interface AllCitiesOptions {
  /** Notification recipients */
  recipients: readonly string[];
  /** Link included in the notification */
  sheetLink: string;
  now?: Date;
  /** Called before each city starts */
  onCityStart?: (city: string, index: number, total: number) => void;
  /** Called after each city finishes */
  onCityDone?: (result: CityScanResult) => void;
}

export async function runSingleCity(
  controls: Readonly<ScanControls>,
  services: ScanServices,
  options: SingleCityOptions = {}
): Promise<CityScanResult> {
  const context = buildRunContext(controls, options.city ?? controls.cityName, {
    tab: options.tab,
    now: options.now,
  });
  return scanCity(context, services);
}

export async function runCount(
  controls: Readonly<ScanControls>,
  services: Pick<ScanServices, 'insights' | 'logger'>,
  options: Pick<SingleCityOptions, 'city' | 'now'> = {}
): Promise<StatusCounts> {
  const context = buildRunContext(controls, options.city ?? controls.cityName, { now: options.now });
  return countByStatus(context, services);
}

export async function runAllCities(
  controls: Readonly<ScanControls>,
  services: ScanServices,
  options: AllCitiesOptions
): Promise<MultiCityResult> {
  const now = options.now ?? new Date();
  const contexts = controls.citiesList.map((city) => buildRunContext(controls, city, { now }));

  const cities: CityScanResult[] = [];
  const newRowsByCity: Record<string, number> = {};

  for (const [index, context] of contexts.entries()) {
    options.onCityStart?.(context.city, index, contexts.length);
    if (controls.log.summary) {
      services.logger?.info(
        `[Runner] All-cities mode: running Area Insights for ${context.city} → tab=${context.tab}`
      );
    }
    const result = await scanCity(context, services);
    cities.push(result);
    newRowsByCity[context.city] = result.rowsAppended;
    options.onCityDone?.(result);
  }

  let notified = false;
  if (controls.notify.enabled) {
    if (!services.notifier) {
      services.logger?.warn('[Email] Notification enabled but no notifier is configured');
    } else {
      try {
        await services.notifier.send(options.recipients, newRowsByCity, options.sheetLink);
        notified = true;
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        services.logger?.warn(`[Email] Notification failed: ${message}`);
      }
    }
  }

  return { cities, newRowsByCity, notified };
}
