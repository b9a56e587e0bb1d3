/**
 * Scan Controls
 *
 * Typed run configuration. Every recognised option is listed in
 * `ScanControlsSchema` with its default; a JSON file may override any of them.
 * Controls are validated once at load time and frozen.
 *
 * @module config/controls
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { LocationModeSchema, OperatingStatusSchema } from '../schemas/insights.js';
import { ConfigurationError } from './errors.js';

// ============================================================================
// Defaults
// ============================================================================

/**
 * Categories scanned when the configuration does not name any.
 */
export const DEFAULT_CATEGORIES = [
  'restaurant',
  'cafe',
  'bakery',
  'bar',
  'coffee_shop',
  'meal_takeaway',
  'meal_delivery',
  'grocery_store',
  'convenience_store',
  'liquor_store',
  'pharmacy',
  'gas_station',
  'gym',
  'hardware_store',
  'electronics_store',
  'clothing_store',
  'department_store',
  'book_store',
  'home_goods_store',
  'furniture_store',
  'lodging',
];

/** Last-resort category when the list, type and keyword are all empty */
export const FALLBACK_CATEGORY = 'restaurant';

/** Controls file looked up in the data directory when `--config` is absent */
export const CONTROLS_FILE_NAME = 'controls.json';

// ============================================================================
// Schema
// ============================================================================

export const FetchStrategyNameSchema = z.enum(['binary-backoff', 'exhaustive']);

export type FetchStrategyName = z.infer<typeof FetchStrategyNameSchema>;

export const SeedModeSchema = z.enum(['daily', 'fixed', 'random']);

export type SeedMode = z.infer<typeof SeedModeSchema>;

export const ShuffleControlsSchema = z.object({
  /** Reorder categories before fetching */
  enabled: z.boolean().default(false),
  /** How the shuffle seed is derived */
  seedMode: SeedModeSchema.default('daily'),
  /** Seed for `fixed` mode; anything that is not an integer becomes 0 */
  fixedSeed: z.union([z.number(), z.string()]).nullish(),
});

export type ShuffleControls = z.infer<typeof ShuffleControlsSchema>;

export const LogControlsSchema = z.object({
  /** Turn on every request/response diagnostic */
  verbose: z.boolean().default(false),
  /** Log the request body when it is built */
  requestBuild: z.boolean().default(false),
  /** Log the request body when it is sent */
  requestSend: z.boolean().default(false),
  /** Log top-level response keys */
  responseKeys: z.boolean().default(true),
  /** Log the first 4000 chars of each response (needs `verbose`) */
  fullResponse: z.boolean().default(false),
  /** Probe, fetch and aggregation summaries */
  summary: z.boolean().default(true),
  /** Number of resolved details to print after a fetch */
  detailsSampleCount: z.number().int().nonnegative().default(5),
});

export type LogControls = z.infer<typeof LogControlsSchema>;

export const ScanControlsSchema = z.object({
  /** City used in single-city mode */
  cityName: z.string().min(1).default('Chattanooga'),

  /** `count` logs one count per status; `places` fetches and writes */
  mode: z.enum(['count', 'places']).default('places'),

  /** Region shape; only `circle` is implemented */
  locationMode: LocationModeSchema.default('circle'),

  /** Radius of the circular region in metres */
  circleRadiusM: z.number().int().positive().default(40234),

  /** Candidate categories, in priority order */
  types: z.array(z.string().trim().min(1)).default(DEFAULT_CATEGORIES),

  /** First fallback when `types` is empty */
  placesType: z.string().nullish(),

  /** Second fallback when `types` is empty */
  placesKeyword: z.string().nullish().default('cafe'),

  /** Operating statuses sent to the API */
  operatingStatus: z
    .array(OperatingStatusSchema)
    .min(1)
    .default(['OPERATING_STATUS_TEMPORARILY_CLOSED']),

  /** Which fetch algorithm maps categories onto requests */
  fetchStrategy: FetchStrategyNameSchema.default('binary-backoff'),

  /** Upstream cap on place records per request */
  maxPlacesPerRequest: z.number().int().positive().default(100),

  /** Ceiling on aggregated insights and resolved details per city */
  overallMax: z.number().int().positive().default(500),

  /** Delay between consecutive detail lookups */
  detailsPauseMs: z.number().int().nonnegative().default(100),

  /** Do not fetch a single category whose count exceeds the cap */
  skipLargeSingleType: z.boolean().default(true),

  /** After skipping, try the other categories one by one */
  singleTypeFallback: z.boolean().default(false),

  shuffle: ShuffleControlsSchema.default({}),

  /** Append rows to the ledger */
  writeEnabled: z.boolean().default(true),

  /** Persist only temporarily-closed businesses */
  writeOnlyClosed: z.boolean().default(true),

  notify: z
    .object({
      /** Email a summary after an all-cities run */
      enabled: z.boolean().default(false),
    })
    .default({}),

  /** Cities visited by an all-cities run, in order */
  citiesList: z.array(z.string().min(1)).min(1).default(['Chattanooga', 'Medellin', 'Santa Cruz']),

  log: LogControlsSchema.default({}),
});

export type ScanControls = z.infer<typeof ScanControlsSchema>;
export type ScanControlsInput = z.input<typeof ScanControlsSchema>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Recursively freeze a plain object.
 */
function deepFreeze<T>(value: T): Readonly<T> {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw controls and freeze the result.
 *
 * @throws ConfigurationError listing every invalid option
 */
export function parseControls(raw: unknown): Readonly<ScanControls> {
  const result = ScanControlsSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid scan controls: ${issues}`);
  }
  return deepFreeze(result.data);
}

export interface LoadControlsOptions {
  /** Explicit controls file; must exist */
  configPath?: string;
  /** Directory searched for `controls.json` when no path is given */
  dataDir?: string;
  /** Applied on top of the file (CLI flags) */
  overrides?: Partial<ScanControlsInput>;
}

async function readControlsFile(filePath: string, required: boolean): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT' && !required) {
      return {};
    }
    throw new ConfigurationError(`Cannot read controls file: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new ConfigurationError(`Invalid JSON in controls file: ${filePath}`);
  }

  const asObject = z.record(z.unknown()).safeParse(parsed);
  if (!asObject.success) {
    throw new ConfigurationError(`Controls file must contain a JSON object: ${filePath}`);
  }
  return asObject.data;
}

/**
 * Load controls from file (if any), apply overrides, validate once.
 */
export async function loadControls(options: LoadControlsOptions = {}): Promise<Readonly<ScanControls>> {
  let fromFile: Record<string, unknown> = {};

  if (options.configPath) {
    fromFile = await readControlsFile(options.configPath, true);
  } else if (options.dataDir) {
    fromFile = await readControlsFile(path.join(options.dataDir, CONTROLS_FILE_NAME), false);
  }

  const overrides = Object.fromEntries(
    Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined)
  );

  return parseControls({ ...fromFile, ...overrides });
}

/**
 * Resolve the category list, substituting a single fallback when empty.
 * Order: configured types → `placesType` → trimmed `placesKeyword` → "restaurant".
 */
export function resolveCategories(
  controls: Pick<ScanControls, 'types' | 'placesType' | 'placesKeyword'>
): { categories: string[]; usedFallback: boolean } {
  if (controls.types.length > 0) {
    return { categories: [...controls.types], usedFallback: false };
  }

  const fallback =
    controls.placesType?.trim() || controls.placesKeyword?.trim() || FALLBACK_CATEGORY;

  return { categories: [fallback], usedFallback: true };
}
