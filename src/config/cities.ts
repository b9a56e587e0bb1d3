/**
 * City Presets
 *
 * Centre coordinates and default `_Raw` ledger tab for each scanned city.
 *
 * @module config/cities
 */

import type { Coordinates } from '../schemas/common.js';
import { UnknownCityError } from './errors.js';

export interface CityPreset {
  /** Display name, also the key used in configuration */
  name: string;
  /** Centre of the circular scan region */
  center: Coordinates;
  /** Default ledger tab (must end in `_Raw`) */
  tab: string;
}

export const CITY_PRESETS: Readonly<Record<string, CityPreset>> = {
  Chattanooga: {
    name: 'Chattanooga',
    center: { lat: 35.0456, lng: -85.3097 },
    tab: 'Chattanooga_Raw',
  },
  Medellin: {
    name: 'Medellin',
    center: { lat: 6.2442, lng: -75.5812 },
    tab: 'Medellin_Raw',
  },
  'Santa Cruz': {
    name: 'Santa Cruz',
    center: { lat: 36.9741, lng: -122.0308 },
    tab: 'SantaCruz_Raw',
  },
};

/**
 * Names of every preset, in declaration order.
 */
export function listCityNames(): string[] {
  return Object.keys(CITY_PRESETS);
}

/**
 * Look up a preset by exact name.
 *
 * @throws UnknownCityError if the city has no preset
 */
export function getCityPreset(name: string): CityPreset {
  const preset = CITY_PRESETS[name];
  if (!preset) {
    throw new UnknownCityError(name, listCityNames());
  }
  return preset;
}
