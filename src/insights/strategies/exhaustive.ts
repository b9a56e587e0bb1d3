/**
 * Exhaustive Aggregation Fetch Strategy
 *
 * Probes each category on its own and merges every category whose count fits
 * under the cap. Categories over the cap are dropped, never split. Results are
 * deduplicated by place resource across the whole run, and aggregation stops as
 * soon as the overall limit is reached. Per-category failures are logged and
 * skipped.
 *
 * @module insights/strategies/exhaustive
 */

import type { PlaceInsight } from '../../schemas/insights.js';
import { fetchPlaceInsights, probe } from '../prober.js';
import type { FetchRequest, FetchStrategy, FetchStrategyOptions } from './types.js';

export class ExhaustiveStrategy implements FetchStrategy {
  readonly name = 'exhaustive' as const;

  constructor(private readonly options: FetchStrategyOptions) {}

  async fetch(request: FetchRequest): Promise<PlaceInsight[]> {
    const { api, logger } = this.options;
    const aggregated: PlaceInsight[] = [];
    const seenPlaces = new Set<string>();
    const limit = request.overallLimit;

    this.summary(
      `[AreaInsights][GatherAll] Start types=${JSON.stringify(request.categories)} ` +
        `max_per=${request.cap} overall_limit=${limit}`
    );

    for (const category of request.categories) {
      const query = { region: request.region, statuses: request.statuses, categories: [category] };

      const counted = await probe(api, query);
      if (!counted.ok) {
        logger?.warn(
          `[AreaInsights][Count][Error] status=${counted.error.status} body=${JSON.stringify(counted.error.body)}`
        );
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

      const fetched = await fetchPlaceInsights(api, query);
      if (!fetched.ok) {
        logger?.warn(
          `[AreaInsights][Places][Error] status=${fetched.error.status} body=${JSON.stringify(fetched.error.body)}`
        );
        continue;
      }

      let added = 0;
      for (const insight of fetched.value) {
        const place = insight.place;
        if (!place || seenPlaces.has(place)) {
          continue;
        }
        seenPlaces.add(place);
        aggregated.push(insight);
        added++;
        if (aggregated.length >= limit) {
          break;
        }
      }

      this.summary(
        `[AreaInsights][Places] returned=${fetched.value.length} for types=${JSON.stringify([category])} ` +
          `added=${added} total=${aggregated.length}`
      );

      if (aggregated.length >= limit) {
        this.summary(`[AreaInsights][GatherAll] Reached overall limit ${limit}; stopping`);
        break;
      }
    }

    this.summary(`[AreaInsights][GatherAll] Finished total=${aggregated.length} unique places`);
    return aggregated;
  }

  private summary(message: string): void {
    if (this.options.logSummary) {
      this.options.logger?.info(message);
    }
  }
}
