/**
 * Details Stage
 *
 * Resolves place references one at a time, pausing between calls. Failed
 * lookups are dropped. Stops once `limit` details are collected.
 *
 * @module pipeline/details
 */

import type { PlaceDetailsResolver } from '../places/client.js';
import type { PlaceInsight } from '../schemas/insights.js';
import type { PlaceDetail } from '../schemas/place.js';
import type { Logger } from './types.js';

export interface ResolveDetailsOptions {
  /** Maximum details to collect */
  limit: number;
  /** Delay between consecutive lookups */
  pauseMs: number;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function resolveDetails(
  resolver: PlaceDetailsResolver,
  insights: readonly PlaceInsight[],
  options: ResolveDetailsOptions
): Promise<PlaceDetail[]> {
  const sleep = options.sleep ?? defaultSleep;
  const details: PlaceDetail[] = [];
  const requested = new Set<string>();

  for (const insight of insights) {
    if (details.length >= options.limit) {
      break;
    }
    const place = insight.place;
    if (!place || requested.has(place)) {
      continue;
    }

    if (requested.size > 0 && options.pauseMs > 0) {
      await sleep(options.pauseMs);
    }
    requested.add(place);

    const detail = await resolver.resolve(place);
    if (detail) {
      details.push(detail);
    } else {
      options.logger?.debug(`[Details] skipped ${place}`);
    }
  }

  return details;
}
