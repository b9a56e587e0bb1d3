/**
 * Identity-Based Deduplication
 *
 * Converges a batch of projected rows against the identities already in the
 * ledger. Identity is column 0 of the row (see `extractPlaceId`), trimmed the
 * same way on both sides.
 *
 * @module dedupe/identity
 */

import { IDENTITY_HEADER, type LedgerRow } from '../schemas/ledger.js';

/**
 * Rows whose identity is non-empty, not already recorded, and not repeated
 * earlier in the batch. Input order is preserved.
 *
 * @example
 * ```typescript
 * const fresh = dedupeNew(rows, new Set(['ChIJabc']));
 * ```
 */
export function dedupeNew(rows: readonly LedgerRow[], existing: ReadonlySet<string>): LedgerRow[] {
  const seenInBatch = new Set<string>();
  const kept: LedgerRow[] = [];

  for (const row of rows) {
    const identity = row[0].trim();
    if (!identity || existing.has(identity) || seenInBatch.has(identity)) {
      continue;
    }
    seenInBatch.add(identity);
    kept.push(row);
  }

  return kept;
}

/**
 * Identity set from a ledger's first column. A leading header cell
 * (`place_id`, any case) and blank cells are dropped.
 */
export function existingIdentitiesFromColumn(column: readonly string[]): Set<string> {
  const values =
    column.length > 0 && column[0].trim().toLowerCase() === IDENTITY_HEADER
      ? column.slice(1)
      : column;

  const identities = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) {
      identities.add(trimmed);
    }
  }
  return identities;
}
