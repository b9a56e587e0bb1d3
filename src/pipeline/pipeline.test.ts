/**
 * Scan Pipeline Tests
 *
 * Runs city scans against in-process fakes of the insights API, the details
 * resolver, the ledger, the snapshot writer and the notifier.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { parseControls, type ScanControlsInput } from '../config/controls.js';
import { ConfigurationError, UnknownCityError, UnsupportedRegionError } from '../config/errors.js';
import { ok, InsightsApiError, fail, type InsightsApi, type InsightsResult } from '../insights/client.js';
import { LedgerTargetError, assertRawTab, type Ledger, type LedgerTab } from '../ledger/types.js';
import type { PlaceDetailsResolver } from '../places/client.js';
import type { Notifier, CityCounts } from '../notify/types.js';
import type { SnapshotWriter } from '../storage/snapshot.js';
import type {
  ComputeInsightsRequest,
  ComputeInsightsResponse,
  InsightKind,
  OperatingStatus,
} from '../schemas/insights.js';
import type { CellValue, LedgerRow } from '../schemas/ledger.js';
import type { PlaceDetail } from '../schemas/place.js';
import { buildRegionFilter, buildRunContext } from './context.js';
import { resolveDetails } from './details.js';
import { countByStatus, scanCity } from './scan.js';
import { runAllCities, runSingleCity } from './runner.js';
import type { Logger, ScanServices } from './types.js';

// ============================================================================
// Fakes
// ============================================================================

interface InsightsCall {
  kind: InsightKind;
  types: string[];
  statuses: OperatingStatus[];
}

type InsightsHandler = (call: InsightsCall) => InsightsResult<ComputeInsightsResponse>;

class FakeInsights implements InsightsApi {
  readonly calls: InsightsCall[] = [];

  constructor(private readonly handler: InsightsHandler) {}

  async compute(request: ComputeInsightsRequest): Promise<InsightsResult<ComputeInsightsResponse>> {
    const call: InsightsCall = {
      kind: request.insights[0],
      types: request.filter.typeFilter?.includedTypes ?? [],
      statuses: request.filter.operatingStatus ?? [],
    };
    this.calls.push(call);
    return this.handler(call);
  }

  typesFor(kind: InsightKind): string[][] {
    return this.calls.filter((call) => call.kind === kind).map((call) => call.types);
  }
}

/**
 * Insights stand-in keyed by the comma-joined type list.
 */
function tableInsights(
  counts: Record<string, number>,
  places: Record<string, string[]> = {}
): FakeInsights {
  return new FakeInsights((call) => {
    const key = call.types.join(',');
    if (call.kind === 'INSIGHT_COUNT') {
      return ok({ count: String(counts[key] ?? 0) });
    }
    return ok({ placeInsights: (places[key] ?? []).map((place) => ({ place })) });
  });
}

class FakeDetails implements PlaceDetailsResolver {
  readonly requested: string[] = [];

  constructor(private readonly details: Record<string, PlaceDetail>) {}

  async resolve(placeResourceName: string): Promise<PlaceDetail | null> {
    this.requested.push(placeResourceName);
    return this.details[placeResourceName] ?? null;
  }
}

class MemoryLedger implements Ledger {
  readonly tabs = new Map<string, CellValue[][]>();

  async ensureTab(name: string, headers: readonly string[]): Promise<LedgerTab> {
    assertRawTab(name);
    const rows = this.tabs.get(name) ?? [];
    if (rows.length === 0) {
      rows.push([...headers]);
    }
    this.tabs.set(name, rows);

    return {
      name,
      readIdentityColumn: async () => rows.map((row) => String(row[0] ?? '')),
      appendRows: async (appended: readonly LedgerRow[]) => {
        rows.push(...appended.map((row) => [...row]));
      },
    };
  }

  identities(tab: string): string[] {
    return (this.tabs.get(tab) ?? []).slice(1).map((row) => String(row[0]));
  }
}

function createMockLogger(): Logger & { messages: string[] } {
  const messages: string[] = [];
  const record = (message: string): void => {
    messages.push(message);
  };
  return { messages, debug: record, info: record, warn: record, error: record };
}

function closedPlace(id: string, types: string[] = ['restaurant', 'food']): PlaceDetail {
  return {
    name: `places/${id}`,
    id,
    displayName: { text: `Place ${id}` },
    formattedAddress: `${id} Main St`,
    location: { latitude: 35.05, longitude: -85.31 },
    types,
    rating: 4.1,
    userRatingCount: 30,
    businessStatus: 'CLOSED_TEMPORARILY',
  };
}

function openPlace(id: string): PlaceDetail {
  return { ...closedPlace(id), businessStatus: 'OPERATIONAL' };
}

function controlsWith(overrides: ScanControlsInput = {}) {
  return parseControls({ detailsPauseMs: 0, ...overrides });
}

const noSleep = async (): Promise<void> => {};

// ============================================================================
// Run Context
// ============================================================================

describe('buildRunContext', () => {
  it('builds a circle region from the city preset', () => {
    const context = buildRunContext(controlsWith(), 'Chattanooga');

    expect(context.tab).toBe('Chattanooga_Raw');
    expect(context.region).toEqual({
      kind: 'circle',
      center: { lat: 35.0456, lng: -85.3097 },
      radiusM: 40234,
    });
    expect(context.statuses).toEqual(['OPERATING_STATUS_TEMPORARILY_CLOSED']);
  });

  it('is frozen', () => {
    const context = buildRunContext(controlsWith(), 'Medellin');

    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.categories)).toBe(true);
    expect(Object.isFrozen(context.controls)).toBe(true);
  });

  it('substitutes the fallback category for an empty list', () => {
    const context = buildRunContext(controlsWith({ types: [] }), 'Chattanooga');

    expect(context.categories).toEqual(['cafe']);
    expect(context.usedCategoryFallback).toBe(true);
  });

  it('applies a tab override', () => {
    expect(buildRunContext(controlsWith(), 'Chattanooga', { tab: ' Test_Raw ' }).tab).toBe('Test_Raw');
  });

  it('rejects a non-raw tab', () => {
    expect(() => buildRunContext(controlsWith(), 'Chattanooga', { tab: 'Chattanooga_View' })).toThrow(
      LedgerTargetError
    );
  });

  it('rejects an unknown city', () => {
    expect(() => buildRunContext(controlsWith(), 'Atlantis')).toThrow(UnknownCityError);
  });

  it('rejects unsupported location modes', () => {
    expect(() => buildRunContext(controlsWith({ locationMode: 'region' }), 'Chattanooga')).toThrow(
      UnsupportedRegionError
    );
    expect(() => buildRunContext(controlsWith({ locationMode: 'customArea' }), 'Chattanooga')).toThrow(
      "Unsupported location mode 'customArea'. Only 'circle' is supported."
    );
  });
});

describe('buildRegionFilter', () => {
  it('rejects an out-of-range centre', () => {
    expect(() =>
      buildRegionFilter({ locationMode: 'circle', circleRadiusM: 1000 }, { lat: 91, lng: 0 })
    ).toThrow(ConfigurationError);
  });
});

// ============================================================================
// Details
// ============================================================================

describe('resolveDetails', () => {
  it('pauses between consecutive lookups only', async () => {
    const sleep = jest.fn<(ms: number) => Promise<void>>(async () => {});
    const resolver = new FakeDetails({ 'places/a': closedPlace('a'), 'places/b': closedPlace('b') });

    await resolveDetails(resolver, [{ place: 'places/a' }, { place: 'places/b' }], {
      limit: 10,
      pauseMs: 100,
      sleep,
    });

    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(100);
  });

  it('skips failed lookups, duplicates and missing references', async () => {
    const resolver = new FakeDetails({ 'places/a': closedPlace('a') });

    const details = await resolveDetails(
      resolver,
      [{ place: 'places/a' }, {}, { place: 'places/missing' }, { place: 'places/a' }],
      { limit: 10, pauseMs: 0 }
    );

    expect(details.map((detail) => detail.id)).toEqual(['a']);
    expect(resolver.requested).toEqual(['places/a', 'places/missing']);
  });

  it('stops at the limit', async () => {
    const resolver = new FakeDetails({
      'places/a': closedPlace('a'),
      'places/b': closedPlace('b'),
      'places/c': closedPlace('c'),
    });

    const details = await resolveDetails(
      resolver,
      [{ place: 'places/a' }, { place: 'places/b' }, { place: 'places/c' }],
      { limit: 2, pauseMs: 0 }
    );

    expect(details).toHaveLength(2);
    expect(resolver.requested).toEqual(['places/a', 'places/b']);
  });
});

// ============================================================================
// scanCity
// ============================================================================

describe('scanCity', () => {
  let ledger: MemoryLedger;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    ledger = new MemoryLedger();
    logger = createMockLogger();
  });

  function services(insights: InsightsApi, details: PlaceDetailsResolver, extra: Partial<ScanServices> = {}): ScanServices {
    return { insights, details, ledger, logger, sleep: noSleep, ...extra };
  }

  it('narrows an over-cap pair to its first category and appends closed places', async () => {
    const insights = tableInsights(
      { 'restaurant,cafe': 250, restaurant: 80 },
      { restaurant: ['places/r1', 'places/r2'] }
    );
    const details = new FakeDetails({ 'places/r1': closedPlace('r1'), 'places/r2': openPlace('r2') });
    const context = buildRunContext(controlsWith({ types: ['restaurant', 'cafe'] }), 'Chattanooga');

    const result = await scanCity(context, services(insights, details));

    expect(insights.typesFor('INSIGHT_COUNT')).toEqual([['restaurant', 'cafe'], ['restaurant']]);
    expect(insights.typesFor('INSIGHT_PLACES')).toEqual([['restaurant']]);
    expect(result).toMatchObject({
      city: 'Chattanooga',
      tab: 'Chattanooga_Raw',
      insightsFound: 2,
      detailsResolved: 2,
      rowsPrepared: 1,
      rowsAppended: 1,
    });
    expect(result.stopReason).toBeUndefined();
    expect(ledger.identities('Chattanooga_Raw')).toEqual(['r1']);
    expect(ledger.tabs.get('Chattanooga_Raw')?.[1]).toEqual([
      'r1',
      'Place r1',
      'CLOSED_TEMPORARILY',
      'r1 Main St',
      35.05,
      -85.31,
      'restaurant,food',
      4.1,
      30,
      'restaurant',
      null,
      null,
    ]);
  });

  it('never issues an empty type filter when no categories are configured', async () => {
    const insights = tableInsights({ cafe: 1 }, { cafe: ['places/c1'] });
    const details = new FakeDetails({ 'places/c1': closedPlace('c1', ['cafe']) });
    const context = buildRunContext(controlsWith({ types: [] }), 'Chattanooga');

    await scanCity(context, services(insights, details));

    expect(insights.calls.length).toBeGreaterThan(0);
    for (const call of insights.calls) {
      expect(call.types).toEqual(['cafe']);
    }
    expect(logger.messages).toContain('[AreaInsights] Using type fallback includedTypes=["cafe"]');
  });

  it('keeps open places when writeOnlyClosed is off', async () => {
    const insights = tableInsights({ bar: 2 }, { bar: ['places/a', 'places/b'] });
    const details = new FakeDetails({ 'places/a': openPlace('a'), 'places/b': closedPlace('b') });
    const context = buildRunContext(controlsWith({ types: ['bar'], writeOnlyClosed: false }), 'Medellin');

    const result = await scanCity(context, services(insights, details));

    expect(result.rowsAppended).toBe(2);
    expect(ledger.identities('Medellin_Raw')).toEqual(['a', 'b']);
  });

  it('skips rows already in the ledger', async () => {
    const insights = tableInsights({ bar: 2 }, { bar: ['places/a', 'places/b'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a'), 'places/b': closedPlace('b') });
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Medellin');
    ledger.tabs.set('Medellin_Raw', [['place_id'], ['a']]);

    const result = await scanCity(context, services(insights, details));

    expect(result.rowsPrepared).toBe(2);
    expect(result.rowsAppended).toBe(1);
    expect(ledger.identities('Medellin_Raw')).toEqual(['a', 'b']);
  });

  it('converges: a second run appends nothing', async () => {
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a') });
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Medellin');

    await scanCity(context, services(insights, details));
    const second = await scanCity(context, services(insights, details));

    expect(second.rowsAppended).toBe(0);
    expect(second.stopReason).toBe('all-duplicates');
    expect(ledger.identities('Medellin_Raw')).toEqual(['a']);
  });

  it('stops without a write when nothing is found', async () => {
    const insights = tableInsights({});
    const details = new FakeDetails({});
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Medellin');

    const result = await scanCity(context, services(insights, details));

    expect(result.stopReason).toBe('no-details');
    expect(insights.typesFor('INSIGHT_PLACES')).toEqual([]);
    expect(ledger.tabs.size).toBe(0);
  });

  it('stops when no place is temporarily closed', async () => {
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': openPlace('a') });
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Medellin');

    const result = await scanCity(context, services(insights, details));

    expect(result.stopReason).toBe('no-rows');
    expect(ledger.tabs.size).toBe(0);
  });

  it('prepares rows without writing when writes are disabled', async () => {
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a') });
    const context = buildRunContext(controlsWith({ types: ['bar'], writeEnabled: false }), 'Medellin');

    const result = await scanCity(context, services(insights, details));

    expect(result.stopReason).toBe('write-disabled');
    expect(result.rowsPrepared).toBe(1);
    expect(ledger.tabs.size).toBe(0);
  });

  it('stops without a ledger', async () => {
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a') });
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Medellin');

    const result = await scanCity(context, services(insights, details, { ledger: undefined }));

    expect(result.stopReason).toBe('no-ledger');
  });

  it('writes a snapshot of the new rows before appending', async () => {
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a') });
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Santa Cruz');
    const order: string[] = [];
    const snapshots: SnapshotWriter = {
      write: async (city, rows) => {
        order.push(`snapshot:${city}:${rows.length}:${ledger.identities('SantaCruz_Raw').length}`);
        return '/tmp/Santa_Cruz_snapshot.csv';
      },
    };

    const result = await scanCity(context, services(insights, details, { snapshots }));

    expect(order).toEqual(['snapshot:Santa Cruz:1:0']);
    expect(result.snapshotPath).toBe('/tmp/Santa_Cruz_snapshot.csv');
    expect(result.rowsAppended).toBe(1);
  });

  it('appends even when the snapshot fails', async () => {
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a') });
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Medellin');
    const snapshots: SnapshotWriter = {
      write: async () => {
        throw new Error('disk full');
      },
    };

    const result = await scanCity(context, services(insights, details, { snapshots }));

    expect(result.rowsAppended).toBe(1);
    expect(result.snapshotPath).toBeUndefined();
    expect(logger.messages).toContain('[Snapshot] Failed for Medellin: disk full');
  });

  it('uses the exhaustive strategy when configured', async () => {
    const insights = tableInsights(
      { bar: 1, cafe: 1 },
      { bar: ['places/a'], cafe: ['places/b'] }
    );
    const details = new FakeDetails({ 'places/a': closedPlace('a', ['bar']), 'places/b': closedPlace('b', ['cafe']) });
    const context = buildRunContext(
      controlsWith({ types: ['bar', 'cafe'], fetchStrategy: 'exhaustive' }),
      'Medellin'
    );

    const result = await scanCity(context, services(insights, details));

    expect(insights.typesFor('INSIGHT_COUNT')).toEqual([['bar'], ['cafe']]);
    expect(result.rowsAppended).toBe(2);
  });
});

// ============================================================================
// countByStatus
// ============================================================================

describe('countByStatus', () => {
  it('probes each status once and counts failures as zero', async () => {
    const insights = new FakeInsights((call) => {
      switch (call.statuses[0]) {
        case 'OPERATING_STATUS_PERMANENTLY_CLOSED':
          return ok({ count: '12' });
        case 'OPERATING_STATUS_TEMPORARILY_CLOSED':
          return ok({ count: '3' });
        default:
          return fail(new InsightsApiError('Area Insights error (500)', 500, { error: 'internal' }));
      }
    });
    const logger = createMockLogger();
    const context = buildRunContext(controlsWith({ types: ['bar'] }), 'Chattanooga');

    const counts = await countByStatus(context, { insights, logger });

    expect(counts).toEqual({
      OPERATING_STATUS_PERMANENTLY_CLOSED: 12,
      OPERATING_STATUS_TEMPORARILY_CLOSED: 3,
      OPERATING_STATUS_OPERATIONAL: 0,
    });
    expect(insights.calls.map((call) => call.statuses)).toEqual([
      ['OPERATING_STATUS_PERMANENTLY_CLOSED'],
      ['OPERATING_STATUS_TEMPORARILY_CLOSED'],
      ['OPERATING_STATUS_OPERATIONAL'],
    ]);
    expect(logger.messages).toContain(
      '[AreaInsights][Count] summary={OPERATING_STATUS_PERMANENTLY_CLOSED:12, OPERATING_STATUS_TEMPORARILY_CLOSED:3, OPERATING_STATUS_OPERATIONAL:0}'
    );
  });
});

// ============================================================================
// Runner
// ============================================================================

describe('runSingleCity', () => {
  it('defaults to the configured city', async () => {
    const ledger = new MemoryLedger();
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a') });

    const result = await runSingleCity(
      controlsWith({ types: ['bar'], cityName: 'Medellin' }),
      { insights, details, ledger, sleep: noSleep }
    );

    expect(result.city).toBe('Medellin');
    expect(ledger.identities('Medellin_Raw')).toEqual(['a']);
  });
});

describe('runAllCities', () => {
  let notifier: Notifier & { send: jest.Mock<Notifier['send']> };

  beforeEach(() => {
    notifier = { send: jest.fn<Notifier['send']>(async () => {}) };
  });

  it('scans every city in order and notifies once with per-city counts', async () => {
    const ledger = new MemoryLedger();
    const insights = tableInsights({ bar: 1 }, { bar: ['places/a'] });
    const details = new FakeDetails({ 'places/a': closedPlace('a') });
    const seen: string[] = [];
    const done: string[] = [];

    const result = await runAllCities(
      controlsWith({ types: ['bar'], notify: { enabled: true } }),
      { insights, details, ledger, notifier, sleep: noSleep },
      {
        recipients: ['team@example.test'],
        sheetLink: 'https://sheets.example.test/d/1',
        onCityStart: (city) => seen.push(city),
        onCityDone: (city) => done.push(`${city.city}:${city.rowsAppended}`),
      }
    );

    const expected: CityCounts = { Chattanooga: 1, Medellin: 1, 'Santa Cruz': 1 };
    expect(seen).toEqual(['Chattanooga', 'Medellin', 'Santa Cruz']);
    expect(done).toEqual(['Chattanooga:1', 'Medellin:1', 'Santa Cruz:1']);
    expect(result.newRowsByCity).toEqual(expected);
    expect(result.notified).toBe(true);
    expect(notifier.send).toHaveBeenCalledTimes(1);
    expect(notifier.send).toHaveBeenCalledWith(['team@example.test'], expected, 'https://sheets.example.test/d/1');
    expect([...ledger.tabs.keys()]).toEqual(['Chattanooga_Raw', 'Medellin_Raw', 'SantaCruz_Raw']);
  });

  it('does not notify when notifications are off', async () => {
    const insights = tableInsights({});

    const result = await runAllCities(
      controlsWith({ types: ['bar'] }),
      { insights, details: new FakeDetails({}), notifier, sleep: noSleep },
      { recipients: ['team@example.test'], sheetLink: 'link' }
    );

    expect(result.notified).toBe(false);
    expect(notifier.send).not.toHaveBeenCalled();
  });

  it('treats a notification failure as a warning', async () => {
    const logger = createMockLogger();
    notifier.send.mockRejectedValueOnce(new Error('SendGrid down'));

    const result = await runAllCities(
      controlsWith({ types: ['bar'], notify: { enabled: true } }),
      { insights: tableInsights({}), details: new FakeDetails({}), notifier, logger, sleep: noSleep },
      { recipients: ['team@example.test'], sheetLink: 'link' }
    );

    expect(result.notified).toBe(false);
    expect(result.cities).toHaveLength(3);
    expect(logger.messages).toContain('[Email] Notification failed: SendGrid down');
  });

  it('rejects an unknown city before any remote call', async () => {
    const insights = tableInsights({});

    await expect(
      runAllCities(
        controlsWith({ citiesList: ['Chattanooga', 'Atlantis'] }),
        { insights, details: new FakeDetails({}), sleep: noSleep },
        { recipients: [], sheetLink: '' }
      )
    ).rejects.toThrow(UnknownCityError);
    expect(insights.calls).toEqual([]);
  });
});
