/**
 * Area Insights
 *
 * Capacity-constrained acquisition of place references:
 * - client.ts: computeInsights HTTP client
 * - prober.ts: count probe and places fetch
 * - selector.ts: deterministic category ordering
 * - strategies/: binary-backoff and exhaustive fetch strategies
 *
 * @module insights
 */

export {
  AreaInsightsClient,
  InsightsApiError,
  isInsightsApiError,
  ok,
  fail,
  type InsightsApi,
  type InsightsResult,
  type TokenProvider,
  type AreaInsightsClientOptions,
} from './client.js';

export {
  probe,
  fetchPlaceInsights,
  buildInsightsRequest,
  parseCountValue,
  toWireLocationFilter,
  EmptyTypeFilterError,
  type InsightsQuery,
} from './prober.js';

export {
  selectOrder,
  seededShuffle,
  deriveSeed,
  deriveDailySeed,
  parseFixedSeed,
  randomSeed,
  createSplitMix64,
  type SelectionPolicy,
  type SelectionContext,
} from './selector.js';

export {
  createFetchStrategy,
  BinaryBackoffStrategy,
  ExhaustiveStrategy,
  nextWorkingSubset,
  type FetchRequest,
  type FetchStrategy,
  type FetchStrategyOptions,
  type BinaryBackoffOptions,
} from './strategies/index.js';
