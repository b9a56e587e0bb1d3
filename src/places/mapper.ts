/**
 * Place to Ledger Row Mapper
 *
 * Projects a resolved Place Detail into the 12-column ledger row. Missing
 * fields follow named fallback rules: identity is `id`, else the resource
 * name; display name is '' unless a string or `{ text }` is present; every
 * other absent value becomes an empty cell.
 *
 * @module places/mapper
 */

import type { CellValue, LedgerRow } from '../schemas/ledger.js';
import { TEMPORARILY_CLOSED_STATUS, type PlaceDetail } from '../schemas/place.js';

/**
 * Grid point a row was found from. This scan queries a single circle, so
 * callers pass `null` for both.
 */
export interface GridPoint {
  lat: number | null;
  lng: number | null;
}

const NO_GRID: GridPoint = { lat: null, lng: null };

/**
 * Identity used for deduplication: `id` when present, else the raw resource name.
 *
 * @example
 * ```typescript
 * extractPlaceId({ name: 'places/abc123' }); // 'places/abc123'
 * extractPlaceId({ id: 'xyz', name: 'places/abc123' }); // 'xyz'
 * ```
 */
export function extractPlaceId(place: Pick<PlaceDetail, 'id' | 'name'>): string {
  return place.id || place.name || '';
}

/**
 * Display name from either a plain string or a LocalizedText object.
 */
export function extractDisplayName(place: Pick<PlaceDetail, 'displayName'>): string {
  const displayName = place.displayName;
  if (typeof displayName === 'string') {
    return displayName;
  }
  return displayName?.text ?? '';
}

/**
 * The place's own types that were requested, in the place's order, comma-joined.
 */
export function selectMatchingCategories(
  placeTypes: readonly string[] | null | undefined,
  requested: readonly string[]
): string {
  if (!placeTypes || placeTypes.length === 0 || requested.length === 0) {
    return '';
  }
  const allowed = new Set(requested);
  return placeTypes.filter((type) => allowed.has(type)).join(',');
}

/**
 * Whether a place is temporarily closed.
 */
export function isTemporarilyClosed(place: Pick<PlaceDetail, 'businessStatus'>): boolean {
  return place.businessStatus === TEMPORARILY_CLOSED_STATUS;
}

function cell(value: string | null | undefined): CellValue {
  return value ?? null;
}

function numberOrNull(value: number | null | undefined): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

/**
 * Map a place detail to a ledger row.
 *
 * @param place - Resolved place detail
 * @param matchedCategories - Label from `selectMatchingCategories` ('' if none)
 * @param grid - Optional grid point; defaults to empty cells
 */
export function projectRow(
  place: PlaceDetail,
  matchedCategories: string,
  grid: GridPoint = NO_GRID
): LedgerRow {
  const location = place.location ?? {};

  return [
    extractPlaceId(place),
    extractDisplayName(place),
    cell(place.businessStatus),
    cell(place.formattedAddress),
    numberOrNull(location.latitude),
    numberOrNull(location.longitude),
    (place.types ?? []).join(','),
    numberOrNull(place.rating),
    numberOrNull(place.userRatingCount),
    matchedCategories,
    grid.lat,
    grid.lng,
  ];
}

/**
 * Fixed row used to check that a ledger tab accepts appends.
 */
export function placeholderRow(): LedgerRow {
  return [
    'test_place_001',
    'Test Café',
    'OPERATIONAL',
    '123 Test St, Chattanooga, TN',
    35.0456,
    -85.3097,
    'cafe,food,point_of_interest,establishment',
    4.5,
    12,
    'closure scan connectivity check',
    35.05,
    -85.31,
  ];
}
