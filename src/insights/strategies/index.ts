/**
 * Fetch Strategies
 *
 * Two implementations of one `FetchStrategy` capability, selected by
 * `controls.fetchStrategy`:
 * - binary-backoff: narrow one category list until it fits under the cap
 * - exhaustive: probe every category singly and merge all that fit
 *
 * @module insights/strategies
 */

import type { FetchStrategyName } from '../../config/controls.js';
import { BinaryBackoffStrategy } from './binary-backoff.js';
import { ExhaustiveStrategy } from './exhaustive.js';
import type { BinaryBackoffOptions, FetchStrategy } from './types.js';

export { BinaryBackoffStrategy, nextWorkingSubset } from './binary-backoff.js';
export { ExhaustiveStrategy } from './exhaustive.js';
export type { BinaryBackoffOptions, FetchRequest, FetchStrategy, FetchStrategyOptions } from './types.js';

/**
 * Create the configured strategy. The single-category policy only applies to
 * binary-backoff; a non-default policy with exhaustive is reported and ignored.
 */
export function createFetchStrategy(
  name: FetchStrategyName,
  options: BinaryBackoffOptions
): FetchStrategy {
  switch (name) {
    case 'binary-backoff':
      return new BinaryBackoffStrategy(options);
    case 'exhaustive': {
      const { api, logSummary, logger, skipLargeSingleType, singleTypeFallback } = options;
      if (!skipLargeSingleType || singleTypeFallback) {
        logger?.warn(
          '[AreaInsights] skipLargeSingleType and singleTypeFallback apply to binary-backoff only; ' +
            'exhaustive drops every over-cap category'
        );
      }
      return new ExhaustiveStrategy({ api, logSummary, logger });
    }
  }
}
