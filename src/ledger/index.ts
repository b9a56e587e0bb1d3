/**
 * Ledger
 *
 * @module ledger
 */

export {
  LedgerError,
  LedgerTargetError,
  assertRawTab,
  isRawTab,
  isLedgerError,
  type Ledger,
  type LedgerTab,
} from './types.js';

export {
  SheetsLedger,
  a1Range,
  NEW_TAB_ROWS,
  MIN_NEW_TAB_COLUMNS,
  type SheetsLedgerOptions,
} from './sheets.js';
