/**
 * Google Sheets Ledger
 *
 * Sheets API v4 over `fetch`, authenticated with a service-account token. Each
 * city's ledger is one tab of a single spreadsheet.
 *
 * @module ledger/sheets
 */

import { z } from 'zod';
import type { TokenProvider } from '../insights/client.js';
import type { Logger } from '../pipeline/types.js';
import type { CellValue, LedgerRow } from '../schemas/ledger.js';
import { LedgerError, assertRawTab, type Ledger, type LedgerTab } from './types.js';

// ============================================================================
// Wire Schemas
// ============================================================================

const SpreadsheetSheetsSchema = z.object({
  sheets: z
    .array(
      z.object({
        properties: z.object({ title: z.string() }).passthrough(),
      })
    )
    .default([]),
});

const ValueRangeSchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).default([]),
});

const AnySchema = z.unknown();

export interface SheetsLedgerOptions {
  /** Override the API base URL */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  logger?: Logger;
  /** Injected for tests */
  fetchImpl?: typeof fetch;
}

const DEFAULTS = {
  baseUrl: 'https://sheets.googleapis.com/v4/spreadsheets',
  timeoutMs: 30000,
} as const;

/** Size of a newly created tab */
export const NEW_TAB_ROWS = 100;
export const MIN_NEW_TAB_COLUMNS = 10;

/**
 * A1 range for a tab, quoting the title.
 *
 * @example
 * ```typescript
 * a1Range("Bob's_Raw", 'A:A'); // "'Bob''s_Raw'!A:A"
 * ```
 */
export function a1Range(tab: string, range: string): string {
  return `'${tab.replace(/'/g, "''")}'!${range}`;
}

function toCell(value: CellValue): string | number {
  return value ?? '';
}

// ============================================================================
// Ledger
// ============================================================================

/**
 * @example
 * ```typescript
 * const ledger = new SheetsLedger(spreadsheetId, tokenProvider);
 * const tab = await ledger.ensureTab('Chattanooga_Raw', LEDGER_HEADERS);
 * await tab.appendRows(rows);
 * ```
 */
export class SheetsLedger implements Ledger {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly spreadsheetId: string,
    private readonly tokens: TokenProvider,
    options: SheetsLedgerOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? DEFAULTS.baseUrl;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async ensureTab(name: string, headers: readonly string[]): Promise<LedgerTab> {
    assertRawTab(name);

    const titles = await this.listTabTitles();
    if (!titles.includes(name)) {
      await this.addTab(name, Math.max(MIN_NEW_TAB_COLUMNS, headers.length));
      this.logger?.info(`[Ledger] Created tab '${name}'`);
    }

    if (headers.length > 0) {
      const firstRow = await this.readRange(a1Range(name, '1:1'));
      if (firstRow.length === 0 || firstRow[0].length === 0) {
        await this.writeHeaderRow(name, headers);
        this.logger?.debug(`[Ledger] Wrote header row to '${name}'`);
      }
    }

    return new SheetsTab(this, name);
  }

  /** @internal */
  async readColumn(tab: string): Promise<string[]> {
    const values = await this.readRange(a1Range(tab, 'A:A'), 'COLUMNS');
    return (values[0] ?? []).map((cell) => String(cell));
  }

  /** @internal */
  async append(tab: string, rows: readonly LedgerRow[]): Promise<void> {
    if (rows.length === 0) {
      return;
    }
    const params = new URLSearchParams({
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
    });
    await this.request(
      'POST',
      `/values/${encodeURIComponent(a1Range(tab, 'A1'))}:append?${params.toString()}`,
      AnySchema,
      { values: rows.map((row) => row.map(toCell)) }
    );
  }

  private async listTabTitles(): Promise<string[]> {
    const data = await this.request('GET', '?fields=sheets.properties.title', SpreadsheetSheetsSchema);
    return data.sheets.map((sheet) => sheet.properties.title);
  }

  private async addTab(title: string, columnCount: number): Promise<void> {
    await this.request('POST', ':batchUpdate', AnySchema, {
      requests: [
        {
          addSheet: {
            properties: {
              title,
              gridProperties: { rowCount: NEW_TAB_ROWS, columnCount },
            },
          },
        },
      ],
    });
  }

  private async writeHeaderRow(tab: string, headers: readonly string[]): Promise<void> {
    const params = new URLSearchParams({ valueInputOption: 'RAW' });
    await this.request(
      'PUT',
      `/values/${encodeURIComponent(a1Range(tab, '1:1'))}?${params.toString()}`,
      AnySchema,
      { values: [[...headers]] }
    );
  }

  private async readRange(
    range: string,
    majorDimension: 'ROWS' | 'COLUMNS' = 'ROWS'
  ): Promise<Array<Array<string | number | boolean>>> {
    const params = new URLSearchParams({ majorDimension });
    const data = await this.request(
      'GET',
      `/values/${encodeURIComponent(range)}?${params.toString()}`,
      ValueRangeSchema
    );
    return data.values;
  }

  /**
   * Issue one API call against the spreadsheet. `path` is appended as-is to
   * the spreadsheet URL (`/values/...`, `:batchUpdate`, `?fields=...`).
   */
  private async request<T>(
    method: 'GET' | 'POST' | 'PUT',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown
  ): Promise<T> {
    const url = `${this.baseUrl}/${encodeURIComponent(this.spreadsheetId)}${path}`;
    const token = await this.tokens.getAccessToken();

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new LedgerError(`Sheets request failed: ${message}`);
    } finally {
      clearTimeout(timeoutId);
    }

    const text = await response.text();
    let data: unknown = null;
    if (text) {
      try {
        data = JSON.parse(text);
      } catch {
        data = text;
      }
    }

    if (!response.ok) {
      throw new LedgerError(`Sheets API error (${response.status})`, response.status, data);
    }

    const parsed = schema.safeParse(data ?? {});
    if (!parsed.success) {
      throw new LedgerError('Unexpected Sheets API response', response.status, data);
    }
    return parsed.data;
  }
}

class SheetsTab implements LedgerTab {
  constructor(
    private readonly ledger: SheetsLedger,
    readonly name: string
  ) {}

  readIdentityColumn(): Promise<string[]> {
    return this.ledger.readColumn(this.name);
  }

  appendRows(rows: readonly LedgerRow[]): Promise<void> {
    return this.ledger.append(this.name, rows);
  }
}
