/**
 * Area Insights Client Tests
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { AreaInsightsClient, InsightsApiError, isInsightsApiError, type TokenProvider } from './client.js';
import type { CircleRegion, ComputeInsightsRequest } from '../schemas/insights.js';
import { ExhaustiveStrategy } from './strategies/exhaustive.js';
import type { Logger } from '../pipeline/types.js';

const ENDPOINT = 'https://areainsights.googleapis.com/v1:computeInsights';

const mockFetch = jest.fn<typeof fetch>();

const tokens: TokenProvider = { getAccessToken: async () => 'test-token' };

const request: ComputeInsightsRequest = {
  insights: ['INSIGHT_COUNT'],
  filter: {
    locationFilter: { circle: { radius: 1000, latLng: { latitude: 6.2442, longitude: -75.5812 } } },
    typeFilter: { includedTypes: ['cafe'] },
  },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function createMockLogger(): Logger & { info: jest.Mock<(message: string) => void> } {
  return { debug: jest.fn(), info: jest.fn<(message: string) => void>(), warn: jest.fn(), error: jest.fn() };
}

describe('AreaInsightsClient', () => {
  let client: AreaInsightsClient;

  beforeEach(() => {
    mockFetch.mockReset();
    client = new AreaInsightsClient(tokens, { fetchImpl: mockFetch });
  });

  it('posts the request with a bearer token', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ count: '5' }));

    await client.compute(request);

    const [url, init] = mockFetch.mock.calls[0];
    expect(url).toBe(ENDPOINT);
    expect(init?.method).toBe('POST');
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
    expect(JSON.parse(String(init?.body))).toEqual(request);
  });

  it('returns the envelope on success', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ count: '5' }));

    expect(await client.compute(request)).toEqual({ ok: true, value: { count: '5' } });
  });

  it('reads a malformed count as absent', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ count: { value: 5 } }));

    const result = await client.compute(request);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.count).toBeUndefined();
    }
  });

  it('keeps the well-formed place insights when one is malformed', async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ count: '2', placeInsights: [{ place: 'places/1' }, { place: null }] })
    );

    const result = await client.compute(request);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.placeInsights).toEqual([{ place: 'places/1' }]);
    }
  });

  it('falls back to an empty envelope when the body is not an object', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse(['places/1']));

    expect(await client.compute(request)).toEqual({ ok: true, value: {} });
  });

  it('returns an error value on a non-200 response', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ error: { code: 403 } }, 403));

    const result = await client.compute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(403);
      expect(result.error.body).toEqual({ error: { code: 403 } });
      expect(result.error.message).toBe('Area Insights error (403)');
    }
  });

  it('returns an error value on a non-JSON body', async () => {
    mockFetch.mockResolvedValueOnce(new Response('<html>502</html>', { status: 502 }));

    const result = await client.compute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(502);
      expect(result.error.body).toBe('<html>502</html>');
    }
  });

  it('maps network errors to status 0', async () => {
    mockFetch.mockRejectedValueOnce(new Error('ECONNREFUSED'));

    const result = await client.compute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(0);
      expect(result.error.message).toBe('Network error: ECONNREFUSED');
    }
  });

  it('returns an error value when the body stream fails', async () => {
    const body = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error('socket reset'));
      },
    });
    mockFetch.mockResolvedValueOnce(new Response(body, { status: 200 }));

    const result = await client.compute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(0);
      expect(result.error.message).toMatch(/^Network error: /);
    }
  });

  it('times out a body that stalls after the headers arrive', async () => {
    const stalling = new AreaInsightsClient(tokens, { fetchImpl: mockFetch, timeoutMs: 20 });
    mockFetch.mockImplementationOnce(async (_url, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          init?.signal?.addEventListener('abort', () => controller.error(new Error('aborted')));
        },
      });
      return new Response(body, { status: 200 });
    });

    const result = await stalling.compute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(408);
      expect(result.error.message).toBe('Request timed out after 20ms');
    }
  });

  it('maps aborts to a 408 timeout', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    mockFetch.mockRejectedValueOnce(abort);

    const result = await client.compute(request);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.status).toBe(408);
      expect(result.error.message).toBe('Request timed out after 60000ms');
    }
  });

  it('lets token failures propagate', async () => {
    const failing = new AreaInsightsClient(
      { getAccessToken: async () => Promise.reject(new Error('no credentials')) },
      { fetchImpl: mockFetch }
    );

    await expect(failing.compute(request)).rejects.toThrow('no credentials');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('logs request and response diagnostics when enabled', async () => {
    const logger = createMockLogger();
    const logged = new AreaInsightsClient(tokens, {
      fetchImpl: mockFetch,
      logger,
      log: { requestBuild: true, responseKeys: true },
    });
    mockFetch.mockResolvedValueOnce(jsonResponse({ count: '5' }));

    await logged.compute(request);

    expect(logger.info).toHaveBeenCalledWith(`[AreaInsights][Build] url=${ENDPOINT} body=${JSON.stringify(request)}`);
    expect(logger.info).toHaveBeenCalledWith('[AreaInsights][Response] keys=["count"]');
    expect(logger.info).toHaveBeenCalledTimes(2);
  });
});

describe('AreaInsightsClient under the exhaustive strategy', () => {
  const region: CircleRegion = { kind: 'circle', center: { lat: 35.0456, lng: -85.3097 }, radiusM: 20000 };

  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('moves on to the next category after a failed body read', async () => {
    const broken = new ReadableStream<Uint8Array>({
      pull(controller) {
        controller.error(new Error('socket reset'));
      },
    });
    mockFetch
      .mockResolvedValueOnce(new Response(broken, { status: 200 }))
      .mockResolvedValueOnce(jsonResponse({ count: '1' }))
      .mockResolvedValueOnce(jsonResponse({ placeInsights: [{ place: 'places/b1' }] }));
    const strategy = new ExhaustiveStrategy({
      api: new AreaInsightsClient(tokens, { fetchImpl: mockFetch }),
      logSummary: false,
    });

    const result = await strategy.fetch({
      region,
      categories: ['a', 'b'],
      statuses: ['OPERATING_STATUS_TEMPORARILY_CLOSED'],
      cap: 100,
      overallLimit: 500,
    });

    expect(result).toEqual([{ place: 'places/b1' }]);
    expect(mockFetch).toHaveBeenCalledTimes(3);
  });
});

describe('isInsightsApiError', () => {
  it('identifies insights errors', () => {
    expect(isInsightsApiError(new InsightsApiError('x', 500, null))).toBe(true);
    expect(isInsightsApiError(new Error('x'))).toBe(false);
  });
});
