/**
 * Area Insights Schemas
 *
 * Region filters, operating statuses and the computeInsights request/response
 * shapes. Response schemas are deliberately loose: every field is optional and
 * the named fallback rules in `insights/prober.ts` decide what a missing value
 * means.
 *
 * @module schemas/insights
 */

import { z } from 'zod';
import { CoordinatesSchema } from './common.js';

// ============================================================================
// Operating Status
// ============================================================================

/**
 * Operating status values accepted by the insights API filter.
 */
export const OperatingStatusSchema = z.enum([
  'OPERATING_STATUS_OPERATIONAL',
  'OPERATING_STATUS_TEMPORARILY_CLOSED',
  'OPERATING_STATUS_PERMANENTLY_CLOSED',
]);

export type OperatingStatus = z.infer<typeof OperatingStatusSchema>;

/** Every status, in the order count mode reports them */
export const ALL_OPERATING_STATUSES: readonly OperatingStatus[] = [
  'OPERATING_STATUS_PERMANENTLY_CLOSED',
  'OPERATING_STATUS_TEMPORARILY_CLOSED',
  'OPERATING_STATUS_OPERATIONAL',
];

// ============================================================================
// Region Filter
// ============================================================================

/**
 * Location modes recognised in configuration. Only `circle` is implemented.
 */
export const LocationModeSchema = z.enum(['circle', 'region', 'customArea']);

export type LocationMode = z.infer<typeof LocationModeSchema>;

/**
 * Circle region: centre plus a strictly positive radius in metres.
 */
export const CircleRegionSchema = z.object({
  kind: z.literal('circle'),
  center: CoordinatesSchema,
  radiusM: z.number().int().positive(),
});

export const RegionFilterSchema = z.discriminatedUnion('kind', [
  CircleRegionSchema,
  z.object({
    kind: z.literal('region'),
    place: z.string().min(1),
  }),
  z.object({
    kind: z.literal('customArea'),
    polygon: z.array(CoordinatesSchema).min(3),
  }),
]);

export type RegionFilter = z.infer<typeof RegionFilterSchema>;
export type CircleRegion = z.infer<typeof CircleRegionSchema>;

// ============================================================================
// computeInsights wire format
// ============================================================================

export type InsightKind = 'INSIGHT_COUNT' | 'INSIGHT_PLACES';

/**
 * Location filter as sent on the wire.
 */
export interface WireLocationFilter {
  circle: {
    radius: number;
    latLng: { latitude: number; longitude: number };
  };
}

/**
 * Request body for `v1:computeInsights`.
 */
export interface ComputeInsightsRequest {
  insights: InsightKind[];
  filter: {
    locationFilter: WireLocationFilter;
    typeFilter?: { includedTypes: string[] };
    operatingStatus?: OperatingStatus[];
  };
}

/**
 * A single place reference returned by INSIGHT_PLACES.
 */
export const PlaceInsightSchema = z
  .object({
    place: z.string().optional(),
  })
  .passthrough();

export type PlaceInsight = z.infer<typeof PlaceInsightSchema>;

/**
 * Place references with a string `place`; any other element is dropped on
 * its own so the rest of the list survives.
 */
const PlaceInsightListSchema = z
  .array(z.unknown())
  .transform((items) =>
    items.flatMap((item): PlaceInsight[] => {
      const parsed = PlaceInsightSchema.safeParse(item);
      return parsed.success && parsed.data.place ? [parsed.data] : [];
    })
  );

/**
 * Loose response envelope. `count` arrives as a numeric string; a field of the
 * wrong shape reads as absent.
 */
export const ComputeInsightsResponseSchema = z
  .object({
    count: z.union([z.string(), z.number()]).nullish().catch(undefined),
    placeInsights: PlaceInsightListSchema.nullish().catch(undefined),
  })
  .passthrough();

export type ComputeInsightsResponse = z.infer<typeof ComputeInsightsResponseSchema>;
