/**
 * Shared Command Options
 *
 * Parsing for flag values that need more than commander's string handling, and
 * the controls loader every scan-related command goes through.
 *
 * @module cli/commands/options
 */

import {
  FetchStrategyNameSchema,
  loadControls,
  type FetchStrategyName,
  type ScanControls,
  type ScanControlsInput,
} from '../../config/controls.js';
import type { CityCounts } from '../../notify/types.js';
import { UsageError, type BaseCommand } from '../base-command.js';

/**
 * Validate a `--strategy` value.
 *
 * @throws UsageError for an unknown strategy name
 */
export function parseStrategy(value: string | undefined): FetchStrategyName | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = FetchStrategyNameSchema.safeParse(value);
  if (!parsed.success) {
    throw new UsageError(
      `Unknown strategy '${value}'. Expected one of: ${FetchStrategyNameSchema.options.join(', ')}`
    );
  }
  return parsed.data;
}

/**
 * Parse `--counts "Chattanooga=3,Santa Cruz=1"`.
 *
 * @throws UsageError for an entry that is not `City=N` with N a non-negative integer
 */
export function parseCityCounts(value: string): CityCounts {
  const counts: Record<string, number> = {};

  for (const entry of value.split(',')) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }
    const match = /^(.+?)\s*=\s*(\d+)$/.exec(trimmed);
    if (!match) {
      throw new UsageError(`Invalid --counts entry '${trimmed}'. Expected City=N`);
    }
    counts[match[1]] = Number.parseInt(match[2], 10);
  }

  return counts;
}

/**
 * Load controls from `--config` (or the data directory) with flag overrides.
 */
export function loadCommandControls(
  base: BaseCommand,
  configPath: string | undefined,
  overrides: Partial<ScanControlsInput> = {}
): Promise<Readonly<ScanControls>> {
  base.debug(`Loading controls (config: ${configPath ?? 'data directory'})`);
  return loadControls({ configPath, dataDir: base.dataDir, overrides });
}
