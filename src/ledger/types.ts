/**
 * Ledger Types
 *
 * The ledger is the append-only record of places already found, one tab per
 * city. Only tabs whose name ends in `_Raw` may be targeted.
 *
 * @module ledger/types
 */

import { ConfigurationError } from '../config/errors.js';
import { RAW_TAB_SUFFIX, type LedgerRow } from '../schemas/ledger.js';

/**
 * One writable tab.
 */
export interface LedgerTab {
  readonly name: string;
  /** Values of the first column, header included, in row order */
  readIdentityColumn(): Promise<string[]>;
  appendRows(rows: readonly LedgerRow[]): Promise<void>;
}

export interface Ledger {
  /**
   * Open a tab, creating it and writing the header row when needed.
   *
   * @throws LedgerTargetError if the name does not end in `_Raw`
   */
  ensureTab(name: string, headers: readonly string[]): Promise<LedgerTab>;
}

/**
 * A remote ledger call failed.
 */
export class LedgerError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: unknown
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

/**
 * Refused to write to a tab that is not a raw tab.
 */
export class LedgerTargetError extends ConfigurationError {
  constructor(public readonly tab: string) {
    super(`Refusing to write: target tab '${tab}' must end with '${RAW_TAB_SUFFIX}'`);
    this.name = 'LedgerTargetError';
  }
}

export function isRawTab(name: string): boolean {
  return name.endsWith(RAW_TAB_SUFFIX);
}

export function assertRawTab(name: string): void {
  if (!isRawTab(name)) {
    throw new LedgerTargetError(name);
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
