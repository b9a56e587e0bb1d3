/**
 * Run Context Construction
 *
 * A run context is built once per city from the validated controls and the
 * city preset, then passed down unchanged. Every configuration error a scan can
 * raise (unknown city, unsupported region shape, non-raw tab) is raised here,
 * before any remote call.
 *
 * @module pipeline/context
 */

import { getCityPreset } from '../config/cities.js';
import { resolveCategories, type ScanControls } from '../config/controls.js';
import { ConfigurationError, UnsupportedRegionError } from '../config/errors.js';
import { assertRawTab } from '../ledger/types.js';
import type { Coordinates } from '../schemas/common.js';
import { CircleRegionSchema, type CircleRegion } from '../schemas/insights.js';
import type { RunContext } from './types.js';

/**
 * Region filter for a centre under the configured location mode.
 *
 * @throws UnsupportedRegionError for `region` and `customArea`
 * @throws ConfigurationError if the circle is invalid
 */
export function buildRegionFilter(
  controls: Pick<ScanControls, 'locationMode' | 'circleRadiusM'>,
  center: Coordinates
): CircleRegion {
  switch (controls.locationMode) {
    case 'circle': {
      const parsed = CircleRegionSchema.safeParse({
        kind: 'circle',
        center,
        radiusM: controls.circleRadiusM,
      });
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => issue.message).join('; ');
        throw new ConfigurationError(`Invalid circle region: ${issues}`);
      }
      return parsed.data;
    }
    case 'region':
    case 'customArea':
      throw new UnsupportedRegionError(controls.locationMode);
  }
}

export interface RunContextOptions {
  /** Ledger tab override (single-city runs) */
  tab?: string;
  /** Run start (default: now) */
  now?: Date;
}

/**
 * Build the immutable context for one city.
 *
 * @throws UnknownCityError, UnsupportedRegionError, LedgerTargetError
 */
export function buildRunContext(
  controls: Readonly<ScanControls>,
  city: string,
  options: RunContextOptions = {}
): RunContext {
  const preset = getCityPreset(city);
  const tab = (options.tab ?? preset.tab).trim();
  assertRawTab(tab);

  const region = buildRegionFilter(controls, preset.center);
  const { categories, usedFallback } = resolveCategories(controls);

  return Object.freeze({
    city: preset.name,
    center: Object.freeze({ ...preset.center }),
    tab,
    region,
    categories: Object.freeze(categories),
    usedCategoryFallback: usedFallback,
    statuses: Object.freeze([...controls.operatingStatus]),
    controls,
    startedAt: options.now ?? new Date(),
  });
}
