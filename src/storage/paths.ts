/**
 * Path Resolution Utilities
 *
 * Directory Structure:
 * ```
 * ~/.closure-scan/                                   # Default data directory
 * ├── controls.json                                  # Optional scan controls
 * └── snapshots/
 *     └── Santa_Cruz_snapshot_2026-W42.csv           # Pre-append CSV, one per city per ISO week
 * ```
 *
 * @module storage/paths
 */

import * as path from 'node:path';
import * as os from 'node:os';

export const DATA_DIR_ENV = 'CLOSURE_SCAN_DATA_DIR';

/**
 * Resolve a configured data directory, expanding a leading `~`.
 * Falls back to `~/.closure-scan`.
 */
export function resolveDataDir(configured: string | undefined): string {
  if (configured) {
    if (configured.startsWith('~')) {
      return path.join(os.homedir(), configured.slice(1));
    }
    return path.resolve(configured);
  }
  return path.join(os.homedir(), '.closure-scan');
}

/**
 * Gets the root data directory from `CLOSURE_SCAN_DATA_DIR`.
 *
 * @example
 * ```typescript
 * process.env.CLOSURE_SCAN_DATA_DIR = '/custom/path';
 * getDataDir(); // '/custom/path'
 * ```
 */
export function getDataDir(): string {
  return resolveDataDir(process.env[DATA_DIR_ENV]);
}

export function getSnapshotsDir(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'snapshots');
}

export function getControlsPath(dataDir: string = getDataDir()): string {
  return path.join(dataDir, 'controls.json');
}
