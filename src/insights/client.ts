/**
 * Area Insights API Client
 *
 * Low-level client for `v1:computeInsights`. Authenticates with a bearer token,
 * enforces a request timeout, and returns upstream failures as values instead of
 * throwing so callers can decide whether to skip a category or abort a fetch.
 *
 * @module insights/client
 */

import type { LogControls } from '../config/controls.js';
import {
  ComputeInsightsResponseSchema,
  type ComputeInsightsRequest,
  type ComputeInsightsResponse,
} from '../schemas/insights.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Upstream failure: a non-200 response, a transport error or an unreadable body.
 * `status` is 0 when no HTTP response was received.
 */
export class InsightsApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly body: unknown
  ) {
    super(message);
    this.name = 'InsightsApiError';
  }
}

export type InsightsResult<T> = { ok: true; value: T } | { ok: false; error: InsightsApiError };

/**
 * The single seam the prober and fetch strategies talk to.
 */
export interface InsightsApi {
  compute(request: ComputeInsightsRequest): Promise<InsightsResult<ComputeInsightsResponse>>;
}

/**
 * Supplies OAuth access tokens.
 */
export interface TokenProvider {
  getAccessToken(): Promise<string>;
}

export interface AreaInsightsClientOptions {
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Override the endpoint */
  endpoint?: string;
  /** Diagnostic toggles */
  log?: Partial<LogControls>;
  logger?: Logger;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

// ============================================================================
// Client Implementation
// ============================================================================

const DEFAULTS = {
  endpoint: 'https://areainsights.googleapis.com/v1:computeInsights',
  timeoutMs: 60000,
} as const;

/** Characters of the raw response printed by the full-response diagnostic */
const FULL_RESPONSE_PREVIEW_CHARS = 4000;

/** Status and fully read body of one HTTP exchange */
interface RawResponse {
  status: number;
  text: string;
}

class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = 'RequestTimeoutError';
  }
}

export function ok<T>(value: T): InsightsResult<T> {
  return { ok: true, value };
}

export function fail<T>(error: InsightsApiError): InsightsResult<T> {
  return { ok: false, error };
}

/**
 * AreaInsightsClient posts computeInsights requests.
 *
 * @example
 * ```typescript
 * const client = new AreaInsightsClient(tokenProvider);
 * const result = await client.compute(request);
 * if (result.ok) console.log(result.value.count);
 * ```
 */
export class AreaInsightsClient implements InsightsApi {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly log: Partial<LogControls>;
  private readonly logger?: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly tokens: TokenProvider,
    options: AreaInsightsClientOptions = {}
  ) {
    this.endpoint = options.endpoint ?? DEFAULTS.endpoint;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.log = options.log ?? {};
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  /**
   * POST a computeInsights request.
   *
   * Token failures are not upstream errors: they propagate as thrown `AuthError`.
   */
  async compute(request: ComputeInsightsRequest): Promise<InsightsResult<ComputeInsightsResponse>> {
    const body = JSON.stringify(request);

    if (this.enabled('requestBuild')) {
      this.logger?.info(`[AreaInsights][Build] url=${this.endpoint} body=${body}`);
    }

    const token = await this.tokens.getAccessToken();

    if (this.enabled('requestSend')) {
      this.logger?.info(`[AreaInsights][Request] POST url=${this.endpoint} body=${body}`);
    }

    let response: RawResponse;
    try {
      response = await this.fetchWithTimeout({
        method: 'POST',
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body,
      });
    } catch (error) {
      return fail(this.toTransportError(error));
    }

    const { text } = response;
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      return fail(
        new InsightsApiError(
          `Area Insights returned non-JSON (status ${response.status})`,
          response.status,
          text
        )
      );
    }

    if (response.status !== 200) {
      return fail(
        new InsightsApiError(`Area Insights error (${response.status})`, response.status, data)
      );
    }

    if (this.enabled('responseKeys') && data && typeof data === 'object') {
      this.logger?.info(`[AreaInsights][Response] keys=${JSON.stringify(Object.keys(data))}`);
    }
    if (this.log.verbose && this.log.fullResponse) {
      this.logger?.info(`[AreaInsights][Response] full=${text.slice(0, FULL_RESPONSE_PREVIEW_CHARS)}`);
    }

    // Shape mismatches fall back to an empty envelope; the prober defaults from there
    const parsed = ComputeInsightsResponseSchema.safeParse(data);
    const envelope: ComputeInsightsResponse = parsed.success ? parsed.data : {};
    return ok(envelope);
  }

  private enabled(flag: 'requestBuild' | 'requestSend' | 'responseKeys'): boolean {
    return this.log.verbose === true || this.log[flag] === true;
  }

  /**
   * Send the request and read the whole body under one timeout. A stalled body
   * aborts the same way a stalled connection does.
   */
  private async fetchWithTimeout(init: RequestInit): Promise<RawResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.endpoint, { ...init, signal: controller.signal });
      const text = await response.text();
      return { status: response.status, text };
    } catch (error) {
      throw controller.signal.aborted ? new RequestTimeoutError(this.timeoutMs) : error;
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private toTransportError(error: unknown): InsightsApiError {
    if (error instanceof RequestTimeoutError || (error instanceof Error && error.name === 'AbortError')) {
      return new InsightsApiError(`Request timed out after ${this.timeoutMs}ms`, 408, null);
    }
    const message = error instanceof Error ? error.message : String(error);
    return new InsightsApiError(`Network error: ${message}`, 0, null);
  }
}

/**
 * Check if an error is an Area Insights API error
 */
export function isInsightsApiError(error: unknown): error is InsightsApiError {
  return error instanceof InsightsApiError;
}
