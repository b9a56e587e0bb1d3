/**
 * Zod Schemas for All Data Types
 *
 * Central export point for schema definitions shared across the scan.
 */

// ============================================================================
// Common Types
// ============================================================================

export {
  CoordinatesSchema,
  CalendarDateSchema,
  toUtcCalendarDate,
  type Coordinates,
  type CalendarDate,
} from './common.js';

// ============================================================================
// Area Insights
// ============================================================================

export {
  OperatingStatusSchema,
  ALL_OPERATING_STATUSES,
  LocationModeSchema,
  CircleRegionSchema,
  RegionFilterSchema,
  PlaceInsightSchema,
  ComputeInsightsResponseSchema,
  type OperatingStatus,
  type LocationMode,
  type RegionFilter,
  type CircleRegion,
  type InsightKind,
  type WireLocationFilter,
  type ComputeInsightsRequest,
  type ComputeInsightsResponse,
  type PlaceInsight,
} from './insights.js';

// ============================================================================
// Places
// ============================================================================

export {
  DisplayNameSchema,
  PlaceDetailSchema,
  TEMPORARILY_CLOSED_STATUS,
  type DisplayName,
  type PlaceDetail,
} from './place.js';

// ============================================================================
// Ledger
// ============================================================================

export {
  LEDGER_HEADERS,
  IDENTITY_HEADER,
  RAW_TAB_SUFFIX,
  type CellValue,
  type LedgerRow,
} from './ledger.js';
