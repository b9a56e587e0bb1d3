/**
 * Deterministic Category Selector
 *
 * Reorders the category list so repeated runs sample different categories
 * first. The `daily` seed is stable for a (city, UTC date) pair:
 * MD5 of `"{city}|{YYYY-MM-DD}"`, first 8 bytes read as an unsigned
 * big-endian integer. The shuffle itself is Fisher–Yates driven by SplitMix64.
 *
 * @module insights/selector
 */

import { createHash, randomBytes } from 'node:crypto';
import type { SeedMode, ShuffleControls } from '../config/controls.js';
import { toUtcCalendarDate } from '../schemas/common.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export type SelectionPolicy = Pick<ShuffleControls, 'enabled' | 'seedMode' | 'fixedSeed'>;

export interface SelectionContext {
  /** City name, part of the daily seed */
  city: string;
  /** Clock used for the daily seed (default: now) */
  now?: Date;
  logger?: Logger;
  /** Log the resulting order */
  logOrder?: boolean;
}

// ============================================================================
// Seeds
// ============================================================================

const UINT64_MASK = (1n << 64n) - 1n;

/**
 * Parse a configured fixed seed. Anything that is not an integer is 0.
 */
export function parseFixedSeed(value: number | string | null | undefined): bigint {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? BigInt.asUintN(64, BigInt(Math.trunc(value))) : 0n;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return /^[+-]?\d+$/.test(trimmed) ? BigInt.asUintN(64, BigInt(trimmed)) : 0n;
  }
  return 0n;
}

/**
 * Seed for a (city, UTC calendar date) pair.
 *
 * @example
 * ```typescript
 * deriveDailySeed('Chattanooga', new Date('2026-10-18T12:00:00Z'));
 * // 4057727044148964305n
 * ```
 */
export function deriveDailySeed(city: string, date: Date): bigint {
  const key = `${city}|${toUtcCalendarDate(date)}`;
  const digest = createHash('md5').update(key, 'utf8').digest();
  return digest.readBigUInt64BE(0);
}

/**
 * Seed from 8 bytes of OS entropy.
 */
export function randomSeed(): bigint {
  return randomBytes(8).readBigUInt64BE(0);
}

/**
 * Resolve the seed for a policy.
 */
export function deriveSeed(
  mode: SeedMode,
  context: { city: string; now?: Date; fixedSeed?: number | string | null }
): bigint {
  switch (mode) {
    case 'fixed':
      return parseFixedSeed(context.fixedSeed);
    case 'random':
      return randomSeed();
    case 'daily':
      return deriveDailySeed(context.city, context.now ?? new Date());
  }
}

// ============================================================================
// Shuffle
// ============================================================================

/**
 * SplitMix64 generator over unsigned 64-bit integers.
 */
export function createSplitMix64(seed: bigint): () => bigint {
  let state = seed & UINT64_MASK;
  return () => {
    state = (state + 0x9e3779b97f4a7c15n) & UINT64_MASK;
    let z = state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & UINT64_MASK;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & UINT64_MASK;
    return z ^ (z >> 31n);
  };
}

/**
 * Fisher–Yates shuffle of a copy; the input is left untouched.
 */
export function seededShuffle<T>(items: readonly T[], seed: bigint): T[] {
  const out = [...items];
  const next = createSplitMix64(seed);

  for (let i = out.length - 1; i > 0; i--) {
    const j = Number(next() % BigInt(i + 1));
    [out[i], out[j]] = [out[j], out[i]];
  }

  return out;
}

/**
 * Order categories for this run.
 *
 * Returns a copy in input order when shuffling is disabled.
 */
export function selectOrder(
  categories: readonly string[],
  policy: SelectionPolicy,
  context: SelectionContext
): string[] {
  if (categories.length === 0) {
    return [];
  }
  if (!policy.enabled) {
    return [...categories];
  }

  const seed = deriveSeed(policy.seedMode, {
    city: context.city,
    now: context.now,
    fixedSeed: policy.fixedSeed,
  });
  const ordered = seededShuffle(categories, seed);

  if (context.logOrder) {
    context.logger?.info(`[AreaInsights][Types] Shuffled order=${JSON.stringify(ordered)}`);
  }

  return ordered;
}
