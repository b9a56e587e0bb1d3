/**
 * City Scan
 *
 * One city, start to finish:
 * select order → fetch strategy → details → status filter → projection →
 * dedupe against the ledger → snapshot → append.
 *
 * Upstream insights errors are absorbed by the strategies. Ledger and auth
 * errors propagate; snapshot failures are warnings.
 *
 * @module pipeline/scan
 */

import { selectOrder } from '../insights/selector.js';
import { createFetchStrategy } from '../insights/strategies/index.js';
import { probe } from '../insights/prober.js';
import { dedupeNew, existingIdentitiesFromColumn } from '../dedupe/index.js';
import {
  extractDisplayName,
  isTemporarilyClosed,
  projectRow,
  selectMatchingCategories,
} from '../places/mapper.js';
import { ALL_OPERATING_STATUSES } from '../schemas/insights.js';
import { LEDGER_HEADERS, type LedgerRow } from '../schemas/ledger.js';
import type { PlaceDetail } from '../schemas/place.js';
import { resolveDetails } from './details.js';
import type {
  CityScanResult,
  Logger,
  RunContext,
  ScanServices,
  ScanStopReason,
  StatusCounts,
} from './types.js';

function summaryLogger(context: RunContext, logger: Logger | undefined): Logger | undefined {
  return context.controls.log.summary ? logger : undefined;
}

function logDetailSample(details: readonly PlaceDetail[], count: number, logger: Logger): void {
  if (count <= 0 || details.length === 0) {
    return;
  }
  logger.info('[AreaInsights][Details][Sample]');
  for (const detail of details.slice(0, count)) {
    logger.info(
      JSON.stringify({
        name: extractDisplayName(detail),
        status: detail.businessStatus ?? null,
        rating: detail.rating ?? null,
        userRatingCount: detail.userRatingCount ?? null,
        address: detail.formattedAddress ?? null,
        lat: detail.location?.latitude ?? null,
        lng: detail.location?.longitude ?? null,
        types: (detail.types ?? []).join(','),
      })
    );
  }
}

/**
 * Project resolved details into rows, keeping only temporarily-closed places
 * when `writeOnlyClosed` is set.
 */
export function prepareRows(context: RunContext, details: readonly PlaceDetail[]): LedgerRow[] {
  const rows: LedgerRow[] = [];
  for (const detail of details) {
    if (context.controls.writeOnlyClosed && !isTemporarilyClosed(detail)) {
      continue;
    }
    const matched = selectMatchingCategories(detail.types, context.categories);
    rows.push(projectRow(detail, matched));
  }
  return rows;
}

/**
 * Scan one city and append its new rows.
 */
export async function scanCity(context: RunContext, services: ScanServices): Promise<CityScanResult> {
  const startTime = Date.now();
  const { controls } = context;
  const logger = services.logger;
  const summary = summaryLogger(context, logger);

  const result: CityScanResult = {
    city: context.city,
    tab: context.tab,
    categories: [],
    insightsFound: 0,
    detailsResolved: 0,
    rowsPrepared: 0,
    rowsAppended: 0,
    durationMs: 0,
  };

  const finish = (stopReason?: ScanStopReason): CityScanResult => {
    result.stopReason = stopReason;
    result.durationMs = Date.now() - startTime;
    return result;
  };

  if (context.usedCategoryFallback) {
    summary?.info(`[AreaInsights] Using type fallback includedTypes=${JSON.stringify(context.categories)}`);
  }

  // 1. Category order
  result.categories = selectOrder(context.categories, controls.shuffle, {
    city: context.city,
    now: context.startedAt,
    logger,
    logOrder: controls.log.summary,
  });

  // 2. Place references
  const strategy = createFetchStrategy(controls.fetchStrategy, {
    api: services.insights,
    skipLargeSingleType: controls.skipLargeSingleType,
    singleTypeFallback: controls.singleTypeFallback,
    logSummary: controls.log.summary,
    logger,
  });
  const insights = await strategy.fetch({
    region: context.region,
    categories: result.categories,
    statuses: context.statuses,
    cap: controls.maxPlacesPerRequest,
    overallLimit: controls.overallMax,
  });
  result.insightsFound = insights.length;

  // 3. Details
  const details = await resolveDetails(services.details, insights, {
    limit: controls.overallMax,
    pauseMs: controls.detailsPauseMs,
    sleep: services.sleep,
    logger,
  });
  result.detailsResolved = details.length;
  summary?.info(`[AreaInsights][Details] fetched=${details.length}`);

  if (details.length === 0) {
    logger?.info('[AreaInsights] No details fetched; nothing to write.');
    return finish('no-details');
  }
  if (logger) {
    logDetailSample(details, controls.log.detailsSampleCount, logger);
  }

  // 4. Rows
  const rows = prepareRows(context, details);
  result.rowsPrepared = rows.length;
  if (rows.length === 0) {
    logger?.info('[AreaInsights] No rows prepared.');
    return finish('no-rows');
  }

  if (!controls.writeEnabled) {
    logger?.info(`[AreaInsights] Write disabled by control. Prepared ${rows.length} rows.`);
    return finish('write-disabled');
  }
  if (!services.ledger) {
    logger?.warn(`[AreaInsights] No ledger configured; skipping write of ${rows.length} rows.`);
    return finish('no-ledger');
  }

  // 5. Dedupe against the ledger
  const tab = await services.ledger.ensureTab(context.tab, LEDGER_HEADERS);
  const existing = existingIdentitiesFromColumn(await tab.readIdentityColumn());
  const unique = dedupeNew(rows, existing);

  if (unique.length === 0) {
    logger?.info('[AreaInsights] No new unique rows to append (deduped).');
    return finish('all-duplicates');
  }

  // 6. Snapshot, then append
  if (services.snapshots) {
    try {
      result.snapshotPath = await services.snapshots.write(context.city, unique, LEDGER_HEADERS);
      logger?.debug(`[Snapshot] Wrote ${result.snapshotPath}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger?.warn(`[Snapshot] Failed for ${context.city}: ${message}`);
    }
  }

  await tab.appendRows(unique);
  result.rowsAppended = unique.length;
  logger?.info(`[AreaInsights] Appended ${unique.length} new rows to '${context.tab}'.`);

  return finish();
}

/**
 * Count mode: one probe per operating status over the configured categories.
 * A failed probe counts as 0.
 */
export async function countByStatus(
  context: RunContext,
  services: Pick<ScanServices, 'insights' | 'logger'>
): Promise<StatusCounts> {
  const logger = services.logger;
  const summary = summaryLogger(context, logger);
  const counts: StatusCounts = {};

  if (context.usedCategoryFallback) {
    summary?.info(`[AreaInsights] Using type fallback includedTypes=${JSON.stringify(context.categories)}`);
  }

  for (const status of ALL_OPERATING_STATUSES) {
    const counted = await probe(services.insights, {
      region: context.region,
      categories: context.categories,
      statuses: [status],
    });
    if (!counted.ok) {
      logger?.warn(
        `[AreaInsights][Count][Error] status=${counted.error.status} body=${JSON.stringify(counted.error.body)}`
      );
    }
    counts[status] = counted.ok ? counted.value : 0;
    summary?.info(`[AreaInsights][Count] ${status}=${counts[status]}`);
  }

  const line = ALL_OPERATING_STATUSES.map((status) => `${status}:${counts[status] ?? 0}`).join(', ');
  summary?.info(`[AreaInsights][Count] summary={${line}}`);

  return counts;
}
