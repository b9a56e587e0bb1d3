/**
 * Scan Pipeline
 *
 * Per-city scan orchestration over the insights, places, dedupe and ledger
 * modules.
 *
 * @module pipeline
 */

export type {
  Logger,
  RunContext,
  ScanServices,
  ScanStopReason,
  CityScanResult,
  StatusCounts,
  MultiCityResult,
} from './types.js';

export { buildRegionFilter, buildRunContext, type RunContextOptions } from './context.js';

export { resolveDetails, defaultSleep, type ResolveDetailsOptions } from './details.js';

export { scanCity, countByStatus, prepareRows } from './scan.js';

export {
  runSingleCity,
  runAllCities,
  runCount,
  type SingleCityOptions,
  type AllCitiesOptions,
} from './runner.js';
