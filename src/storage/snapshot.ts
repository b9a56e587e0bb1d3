/**
 * CSV Snapshots
 *
 * Before rows are appended to the ledger, they are written to a CSV file named
 * after the city and the ISO week. A later run in the same week overwrites it,
 * so the file always holds the latest pre-append batch.
 *
 * @module storage/snapshot
 */

import * as path from 'node:path';
import type { CellValue } from '../schemas/ledger.js';
import { atomicWriteFile } from './atomic.js';
import { getSnapshotsDir } from './paths.js';

export interface SnapshotWriter {
  /**
   * @returns Absolute path of the written file
   */
  write(city: string, rows: ReadonlyArray<readonly CellValue[]>, headers?: readonly string[]): Promise<string>;
}

/**
 * ISO 8601 week stamp (`YYYY-Www`) of a date, in UTC.
 *
 * @example
 * ```typescript
 * isoWeekStamp(new Date('2026-10-18T00:00:00Z')); // '2026-W42'
 * ```
 */
export function isoWeekStamp(date: Date): string {
  const thursday = new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));
  const weekday = thursday.getUTCDay() || 7;
  thursday.setUTCDate(thursday.getUTCDate() + 4 - weekday);

  const isoYear = thursday.getUTCFullYear();
  const yearStart = Date.UTC(isoYear, 0, 1);
  const week = Math.ceil(((thursday.getTime() - yearStart) / 86_400_000 + 1) / 7);

  return `${isoYear}-W${String(week).padStart(2, '0')}`;
}

/**
 * File-name-safe city: letters, digits, `_`, `-` and spaces kept, then spaces
 * become underscores.
 */
export function safeCityName(city: string): string {
  return Array.from(city)
    .filter((char) => /[\p{L}\p{N}_\- ]/u.test(char))
    .join('')
    .trim()
    .replace(/ /g, '_');
}

/**
 * Quote a CSV field only when it contains a comma, quote or line break.
 */
export function formatCsvField(value: CellValue): string {
  if (value === null) {
    return '';
  }
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function formatCsv(
  rows: ReadonlyArray<readonly CellValue[]>,
  headers?: readonly string[]
): string {
  const lines: string[] = [];
  if (headers && headers.length > 0) {
    lines.push(headers.map(formatCsvField).join(','));
  }
  for (const row of rows) {
    lines.push(row.map(formatCsvField).join(','));
  }
  return lines.map((line) => `${line}\r\n`).join('');
}

export interface CsvSnapshotWriterOptions {
  /** Target directory (default: `<dataDir>/snapshots`) */
  directory?: string;
  /** Clock for the week stamp (default: now) */
  now?: () => Date;
}

export class CsvSnapshotWriter implements SnapshotWriter {
  private readonly directory: string;
  private readonly now: () => Date;

  constructor(options: CsvSnapshotWriterOptions = {}) {
    this.directory = options.directory ?? getSnapshotsDir();
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Path the snapshot for a city would be written to now.
   */
  pathFor(city: string): string {
    const fileName = `${safeCityName(city)}_snapshot_${isoWeekStamp(this.now())}.csv`;
    return path.resolve(this.directory, fileName);
  }

  async write(
    city: string,
    rows: ReadonlyArray<readonly CellValue[]>,
    headers?: readonly string[]
  ): Promise<string> {
    const filePath = this.pathFor(city);
    await atomicWriteFile(filePath, formatCsv(rows, headers));
    return filePath;
  }
}
