/**
 * Binary-Backoff Fetch Strategy
 *
 * Probes the working category list and fetches it once its count fits under the
 * cap. While it does not fit, the trailing half of the list is dropped, so the
 * categories at the front (the selector's ordering) take priority. A single
 * category that still exceeds the cap is either skipped, optionally followed by
 * a scan of the other categories, or fetched anyway.
 *
 * @module insights/strategies/binary-backoff
 */

import type { PlaceInsight } from '../../schemas/insights.js';
import type { InsightsApiError } from '../client.js';
import { fetchPlaceInsights, probe, type InsightsQuery } from '../prober.js';
import type { BinaryBackoffOptions, FetchRequest, FetchStrategy } from './types.js';

/**
 * Next working subset after an over-cap probe: the first
 * `N - max(1, floor(N / 2))` categories.
 *
 * @example
 * ```typescript
 * nextWorkingSubset(['a', 'b', 'c', 'd', 'e']); // ['a', 'b', 'c']
 * nextWorkingSubset(['restaurant', 'cafe']); // ['restaurant']
 * ```
 */
export function nextWorkingSubset(subset: readonly string[]): string[] {
  const dropCount = Math.max(1, Math.floor(subset.length / 2));
  return subset.slice(0, subset.length - dropCount);
}

export class BinaryBackoffStrategy implements FetchStrategy {
  readonly name = 'binary-backoff' as const;

  constructor(private readonly options: BinaryBackoffOptions) {}

  async fetch(request: FetchRequest): Promise<PlaceInsight[]> {
    const original = [...request.categories];
    let working = [...original];

    while (working.length > 0) {
      const query = this.query(request, working);
      const counted = await probe(this.options.api, query);
      if (!counted.ok) {
        this.logError('Count', counted.error);
        return [];
      }

      const count = counted.value;
      this.summary(`[AreaInsights][Count] types=${JSON.stringify(working)} count=${count}`);

      if (count === 0) {
        return [];
      }

      if (count <= request.cap) {
        return this.fetchOrEmpty(query);
      }

      if (working.length === 1) {
        const [single] = working;

        if (!this.options.skipLargeSingleType) {
          // Nothing left to split: fetch the single category despite the cap
          this.summary(
            `[AreaInsights][Count] single type ${single} exceeds ${request.cap}; fetching anyway`
          );
          return this.fetchOrEmpty(query);
        }

        this.summary(
          `[AreaInsights][Count] single type ${single} exceeds ${request.cap}; skipping fetch`
        );
        if (this.options.singleTypeFallback) {
          return this.singleTypeFallback(request, original, single);
        }
        return [];
      }

      working = nextWorkingSubset(working);
      this.summary(`[AreaInsights][Count] Reducing types; retry with ${JSON.stringify(working)}`);
    }

    return [];
  }

  /**
   * Probe every other category of the original list, in order, and fetch the
   * first whose count is non-zero and within the cap. Failures skip a category.
   */
  private async singleTypeFallback(
    request: FetchRequest,
    original: readonly string[],
    skipped: string
  ): Promise<PlaceInsight[]> {
    this.summary('[AreaInsights][Count] Trying next available single-type fallbacks');

    for (const category of original) {
      if (category === skipped) {
        continue;
      }

      const query = this.query(request, [category]);
      const counted = await probe(this.options.api, query);
      if (!counted.ok) {
        this.logError('Count', counted.error);
        continue;
      }

      const count = counted.value;
      this.summary(`[AreaInsights][Count] types=${JSON.stringify([category])} count=${count}`);

      if (count === 0) {
        continue;
      }
      if (count > request.cap) {
        this.summary(
          `[AreaInsights][Count] single type ${category} exceeds ${request.cap}; skipping fetch`
        );
        continue;
      }

      const fetched = await fetchPlaceInsights(this.options.api, query);
      if (!fetched.ok) {
        this.logError('Places', fetched.error);
        continue;
      }
      this.summary(
        `[AreaInsights][Places] returned=${fetched.value.length} for types=${JSON.stringify([category])}`
      );
      return fetched.value;
    }

    return [];
  }

  private async fetchOrEmpty(query: InsightsQuery): Promise<PlaceInsight[]> {
    const fetched = await fetchPlaceInsights(this.options.api, query);
    if (!fetched.ok) {
      this.logError('Places', fetched.error);
      return [];
    }
    this.summary(
      `[AreaInsights][Places] returned=${fetched.value.length} for types=${JSON.stringify(query.categories)}`
    );
    return fetched.value;
  }

  private query(request: FetchRequest, categories: string[]): InsightsQuery {
    return { region: request.region, statuses: request.statuses, categories };
  }

  private summary(message: string): void {
    if (this.options.logSummary) {
      this.options.logger?.info(message);
    }
  }

  private logError(stage: 'Count' | 'Places', error: InsightsApiError): void {
    this.options.logger?.warn(
      `[AreaInsights][${stage}][Error] status=${error.status} body=${JSON.stringify(error.body)}`
    );
  }
}
