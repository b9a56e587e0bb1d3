/**
 * CLI Formatters
 *
 * Re-exports all CLI formatting utilities.
 *
 * @module cli/formatters
 */

// Progress display utilities
export {
  ProgressSpinner,
  CityProgressDisplay,
  createSpinner,
  formatDuration,
  type CityStatus,
  type CityDisplay,
  type SpinnerOptions,
} from './progress.js';

// Run summary formatters
export { formatCityResult, formatMultiCitySummary, formatStatusCounts } from './run-summary.js';
