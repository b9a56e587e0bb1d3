/**
 * Scan Pipeline Types
 *
 * Shared types for the per-city scan: the immutable run context, the
 * collaborators a scan needs, and the result it reports.
 *
 * @module pipeline/types
 */

import type { Coordinates } from '../schemas/common.js';
import type { CircleRegion, OperatingStatus } from '../schemas/insights.js';
import type { ScanControls } from '../config/controls.js';
import type { InsightsApi } from '../insights/client.js';
import type { PlaceDetailsResolver } from '../places/client.js';
import type { Ledger } from '../ledger/types.js';
import type { SnapshotWriter } from '../storage/snapshot.js';
import type { Notifier } from '../notify/types.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for the scan.
 * Allows modules to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Run Context
// ============================================================================

/**
 * Everything a single city's scan reads. Built fresh per city and never mutated.
 */
export interface RunContext {
  /** City name (also the daily-seed key) */
  readonly city: string;

  /** Centre of the scan region */
  readonly center: Coordinates;

  /** Ledger tab rows are appended to (ends in `_Raw`) */
  readonly tab: string;

  /** Circular region sent to the insights API */
  readonly region: CircleRegion;

  /** Non-empty category list, in configured order */
  readonly categories: readonly string[];

  /** True when `categories` is the single fallback category */
  readonly usedCategoryFallback: boolean;

  /** Operating statuses sent to the API */
  readonly statuses: readonly OperatingStatus[];

  /** Validated controls */
  readonly controls: Readonly<ScanControls>;

  /** When the run started (daily seed date, snapshot week) */
  readonly startedAt: Date;
}

// ============================================================================
// Services
// ============================================================================

/**
 * Remote and local collaborators of a scan. The ledger, snapshot writer and
 * notifier are optional: without a ledger rows are prepared but not written.
 */
export interface ScanServices {
  insights: InsightsApi;
  details: PlaceDetailsResolver;
  ledger?: Ledger;
  snapshots?: SnapshotWriter;
  notifier?: Notifier;
  logger?: Logger;
  /** Injected for tests; defaults to a timer-based sleep */
  sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Results
// ============================================================================

/**
 * Why a city scan ended without appending rows.
 */
export type ScanStopReason =
  | 'no-details'
  | 'no-rows'
  | 'write-disabled'
  | 'no-ledger'
  | 'all-duplicates';

/**
 * Outcome of one city's scan.
 */
export interface CityScanResult {
  city: string;
  tab: string;
  /** Category order actually used */
  categories: string[];
  /** Place references returned by the fetch strategy */
  insightsFound: number;
  /** Details resolved successfully */
  detailsResolved: number;
  /** Rows prepared after the status filter */
  rowsPrepared: number;
  /** Rows appended to the ledger */
  rowsAppended: number;
  /** Snapshot written before the append, if any */
  snapshotPath?: string;
  /** Set when nothing was appended */
  stopReason?: ScanStopReason;
  durationMs: number;
}

/**
 * Outcome of count mode: one count per operating status.
 */
export type StatusCounts = Partial<Record<OperatingStatus, number>>;

/**
 * Outcome of an all-cities run.
 */
export interface MultiCityResult {
  cities: CityScanResult[];
  /** New rows per city, as sent to the notifier */
  newRowsByCity: Record<string, number>;
  /** Whether the notification went out */
  notified: boolean;
}
