/**
 * Fetch Strategy Types
 *
 * A fetch strategy maps a category list onto one or more capacity-safe
 * count-then-fetch requests and returns the place references it collected.
 *
 * @module insights/strategies/types
 */

import type { FetchStrategyName } from '../../config/controls.js';
import type { PlaceInsight } from '../../schemas/insights.js';
import type { Logger } from '../../pipeline/types.js';
import type { InsightsApi } from '../client.js';
import type { InsightsQuery } from '../prober.js';

/**
 * Input to a strategy run.
 */
export interface FetchRequest extends InsightsQuery {
  /** Upstream cap on place records per request */
  cap: number;
  /** Ceiling on the aggregated result (exhaustive strategy) */
  overallLimit: number;
}

export interface FetchStrategy {
  readonly name: FetchStrategyName;
  fetch(request: FetchRequest): Promise<PlaceInsight[]>;
}

export interface FetchStrategyOptions {
  api: InsightsApi;
  /** Emit probe/fetch summaries */
  logSummary: boolean;
  logger?: Logger;
}

/**
 * Policy for a single category that is still over the cap after narrowing.
 * Only binary-backoff narrows; exhaustive always drops over-cap categories.
 */
export interface BinaryBackoffOptions extends FetchStrategyOptions {
  /** Skip (rather than fetch) a single category whose count exceeds the cap */
  skipLargeSingleType: boolean;
  /** After skipping, scan the other categories one at a time */
  singleTypeFallback: boolean;
}
