/**
 * Ledger Row Shape
 *
 * The fixed 12-column row appended to a city's `_Raw` tab.
 *
 * @module schemas/ledger
 */

/**
 * A single spreadsheet cell. `null` is written as an empty cell.
 */
export type CellValue = string | number | null;

/**
 * Ordered ledger row. Position 0 is the identity used for deduplication.
 */
export type LedgerRow = [
  placeId: string,
  name: string,
  businessStatus: CellValue,
  businessAddress: CellValue,
  lat: number | null,
  lng: number | null,
  types: string,
  rating: number | null,
  userRatingsTotal: number | null,
  keyword: string,
  gridLat: number | null,
  gridLng: number | null,
];

/**
 * Header row, in column order.
 */
export const LEDGER_HEADERS = [
  'place_id',
  'name',
  'business_status',
  'business_address',
  'lat',
  'lng',
  'types',
  'rating',
  'user_ratings_total',
  'keyword',
  'grid_lat',
  'grid_lng',
] as const;

/** Name of the identity column header */
export const IDENTITY_HEADER = LEDGER_HEADERS[0];

/** Suffix a tab name must carry before it may be written */
export const RAW_TAB_SUFFIX = '_Raw';
