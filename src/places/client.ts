/**
 * Google Places Details Client
 *
 * Resolves a place resource name (`places/...`) returned by Area Insights into
 * the fields the ledger needs, using the Places API (New) Place Details
 * endpoint with a field mask. A failed lookup resolves to `null`; it never
 * throws, so one bad place cannot abort a batch.
 *
 * @module places/client
 */

import { PlaceDetailSchema, type PlaceDetail } from '../schemas/place.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Resolves place references to details.
 */
export interface PlaceDetailsResolver {
  resolve(placeResourceName: string): Promise<PlaceDetail | null>;
}

export interface PlaceDetailsClientOptions {
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  /** Override the API base URL */
  baseUrl?: string;
  logger?: Logger;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

// ============================================================================
// Client Implementation
// ============================================================================

const DEFAULTS = {
  baseUrl: 'https://places.googleapis.com/v1',
  timeoutMs: 30000,
} as const;

/**
 * Fields requested from Place Details. Using a field mask keeps the SKU cheap.
 */
export const DETAILS_FIELDS = [
  'name',
  'id',
  'displayName',
  'formattedAddress',
  'location',
  'types',
  'rating',
  'userRatingCount',
  'businessStatus',
].join(',');

/**
 * PlaceDetailsClient fetches Place Details with an API key.
 *
 * @example
 * ```typescript
 * const client = new PlaceDetailsClient(apiKey);
 * const detail = await client.resolve('places/ChIJN1t_tDeuEmsRUsoyG83frY4');
 * console.log(detail?.businessStatus);
 * ```
 */
export class PlaceDetailsClient implements PlaceDetailsResolver {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly apiKey: string,
    options: PlaceDetailsClientOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? DEFAULTS.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * Get details for a place resource name.
   *
   * @returns The parsed detail, or null on any failure
   */
  async resolve(placeResourceName: string): Promise<PlaceDetail | null> {
    const params = new URLSearchParams({ fields: DETAILS_FIELDS });
    const url = `${this.baseUrl}/${placeResourceName}?${params.toString()}`;

    let response: { status: number; text: string };
    try {
      response = await this.fetchWithTimeout(url, {
        headers: { 'X-Goog-Api-Key': this.apiKey },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger?.debug(`[Details] request failed for ${placeResourceName}: ${message}`);
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(response.text);
    } catch {
      this.logger?.warn(
        `Place Details returned non-JSON (status ${response.status}) for ${placeResourceName}`
      );
      return null;
    }

    if (response.status !== 200) {
      this.logger?.debug(`[Details] status ${response.status} for ${placeResourceName}`);
      return null;
    }

    const parsed = PlaceDetailSchema.safeParse(data);
    if (!parsed.success) {
      this.logger?.debug(`[Details] unexpected shape for ${placeResourceName}`);
      return null;
    }
    return parsed.data;
  }

  /**
   * Fetch and read the body under one timeout.
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<{ status: number; text: string }> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      return { status: response.status, text: await response.text() };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
