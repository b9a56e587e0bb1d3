/**
 * Capacity Prober
 *
 * Count-then-fetch helpers over the insights API: request construction with a
 * mandatory type filter, the count probe, and the places fetch. Both return
 * `InsightsResult` values; neither throws on upstream failure.
 *
 * @module insights/prober
 */

import type {
  CircleRegion,
  ComputeInsightsRequest,
  ComputeInsightsResponse,
  InsightKind,
  OperatingStatus,
  PlaceInsight,
  WireLocationFilter,
} from '../schemas/insights.js';
import { ok, type InsightsApi, type InsightsResult } from './client.js';

/**
 * One (region, categories, statuses) triple.
 */
export interface InsightsQuery {
  region: CircleRegion;
  categories: readonly string[];
  statuses: readonly OperatingStatus[];
}

/**
 * Thrown when a probe or fetch is attempted with no categories. The upstream
 * API rejects an empty type filter, so this is a caller bug, not an API error.
 */
export class EmptyTypeFilterError extends Error {
  constructor() {
    super('Type filter must contain at least one category');
    this.name = 'EmptyTypeFilterError';
  }
}

/**
 * Convert a circle region to the wire `locationFilter`.
 */
export function toWireLocationFilter(region: CircleRegion): WireLocationFilter {
  return {
    circle: {
      radius: region.radiusM,
      latLng: {
        latitude: region.center.lat,
        longitude: region.center.lng,
      },
    },
  };
}

/**
 * Build a computeInsights request for one insight kind.
 *
 * @throws EmptyTypeFilterError if `query.categories` is empty
 */
export function buildInsightsRequest(kind: InsightKind, query: InsightsQuery): ComputeInsightsRequest {
  if (query.categories.length === 0) {
    throw new EmptyTypeFilterError();
  }

  const request: ComputeInsightsRequest = {
    insights: [kind],
    filter: {
      locationFilter: toWireLocationFilter(query.region),
      typeFilter: { includedTypes: [...query.categories] },
    },
  };

  if (query.statuses.length > 0) {
    request.filter.operatingStatus = [...query.statuses];
  }

  return request;
}

/**
 * Parse the `count` field. Absent, blank, fractional (string or number) or
 * otherwise non-integer values count as 0.
 */
export function parseCountValue(response: Pick<ComputeInsightsResponse, 'count'>): number {
  const raw = response.count;

  if (typeof raw === 'number') {
    return Number.isInteger(raw) && raw > 0 ? raw : 0;
  }

  if (typeof raw === 'string') {
    const trimmed = raw.trim();
    if (!/^\+?\d+$/.test(trimmed)) {
      return 0;
    }
    return Number.parseInt(trimmed, 10);
  }

  return 0;
}

/**
 * Count the places matching a query.
 */
export async function probe(api: InsightsApi, query: InsightsQuery): Promise<InsightsResult<number>> {
  const result = await api.compute(buildInsightsRequest('INSIGHT_COUNT', query));
  if (!result.ok) {
    return result;
  }
  return ok(parseCountValue(result.value));
}

/**
 * Fetch the place references matching a query. A missing list is empty.
 */
export async function fetchPlaceInsights(
  api: InsightsApi,
  query: InsightsQuery
): Promise<InsightsResult<PlaceInsight[]>> {
  const result = await api.compute(buildInsightsRequest('INSIGHT_PLACES', query));
  if (!result.ok) {
    return result;
  }
  return ok(result.value.placeInsights ?? []);
}
