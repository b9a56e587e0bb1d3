/**
 * Google Places
 *
 * - client.ts: Place Details resolver
 * - mapper.ts: Place Detail to ledger row projection
 *
 * @module places
 */

export {
  PlaceDetailsClient,
  DETAILS_FIELDS,
  type PlaceDetailsResolver,
  type PlaceDetailsClientOptions,
} from './client.js';

export {
  projectRow,
  extractPlaceId,
  extractDisplayName,
  selectMatchingCategories,
  isTemporarilyClosed,
  placeholderRow,
  type GridPoint,
} from './mapper.js';
