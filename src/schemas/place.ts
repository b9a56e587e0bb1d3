/**
 * Place Detail Schema
 *
 * Shape of a Places API (v1) Place Details response, restricted to the fields
 * the ledger needs. All fields are optional and a field of the wrong shape reads
 * as absent; projection applies defaults.
 *
 * @module schemas/place
 */

import { z } from 'zod';

/**
 * Display name: the API returns a LocalizedText object, older payloads a string.
 */
export const DisplayNameSchema = z.union([
  z.string(),
  z
    .object({
      text: z.string().optional(),
      languageCode: z.string().optional(),
    })
    .passthrough(),
]);

export type DisplayName = z.infer<typeof DisplayNameSchema>;

export const PlaceDetailSchema = z
  .object({
    /** Resource name, e.g. "places/ChIJ..." */
    name: z.string().optional().catch(undefined),
    /** Bare place id */
    id: z.string().optional().catch(undefined),
    displayName: DisplayNameSchema.nullish().catch(undefined),
    formattedAddress: z.string().nullish().catch(undefined),
    location: z
      .object({
        latitude: z.number().optional().catch(undefined),
        longitude: z.number().optional().catch(undefined),
      })
      .nullish()
      .catch(undefined),
    types: z.array(z.string()).nullish().catch(undefined),
    rating: z.number().nullish().catch(undefined),
    userRatingCount: z.number().nullish().catch(undefined),
    businessStatus: z.string().nullish().catch(undefined),
  })
  .passthrough();

export type PlaceDetail = z.infer<typeof PlaceDetailSchema>;

/** Business status the ledger keeps when only closures are written */
export const TEMPORARILY_CLOSED_STATUS = 'CLOSED_TEMPORARILY';
