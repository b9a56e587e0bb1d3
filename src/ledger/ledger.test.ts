/**
 * Ledger Tests
 *
 * SheetsLedger against an in-process stand-in for the Sheets v4 endpoints.
 */

import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { z } from 'zod';
import { SheetsLedger, a1Range } from './sheets.js';
import { LedgerError, LedgerTargetError, assertRawTab } from './types.js';
import { LEDGER_HEADERS, type LedgerRow } from '../schemas/ledger.js';
import type { TokenProvider } from '../insights/client.js';

// ============================================================================
// Test Fixtures
// ============================================================================

const BASE = 'https://sheets.googleapis.com/v4/spreadsheets/test-sheet';

interface RecordedCall {
  method: string;
  url: string;
  body: unknown;
}

/**
 * Minimal in-memory spreadsheet answering the calls SheetsLedger makes.
 */
class FakeSheets {
  readonly tabs = new Map<string, Array<Array<string | number>>>();
  readonly calls: RecordedCall[] = [];
  failWith?: number;

  readonly fetch = jest.fn<typeof fetch>(async (input, init) => {
    const url = String(input);
    const method = init?.method ?? 'GET';
    const rawBody = init?.body;
    const body: unknown = typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined;
    this.calls.push({ method, url, body });

    if (this.failWith) {
      return json({ error: { message: 'boom' } }, this.failWith);
    }

    const path = decodeURIComponent(url.slice(BASE.length));

    if (method === 'GET' && path.startsWith('?fields=')) {
      return json({ sheets: [...this.tabs.keys()].map((title) => ({ properties: { title } })) });
    }

    if (method === 'POST' && path === ':batchUpdate') {
      const title = readAddSheetTitle(body);
      this.tabs.set(title, []);
      return json({ replies: [{}] });
    }

    const match = /^\/values\/'(.+)'!([^?]+?)(:append)?\?(.*)$/.exec(path);
    if (!match) {
      return json({ error: 'unexpected path' }, 404);
    }
    const [, tab, range, append] = match;
    const rows = this.tabs.get(tab) ?? [];

    if (method === 'GET' && range === '1:1') {
      return json(rows.length > 0 ? { values: [rows[0]] } : {});
    }
    if (method === 'GET' && range === 'A:A') {
      return json(rows.length > 0 ? { values: [rows.map((row) => row[0])] } : {});
    }
    if (method === 'PUT' && range === '1:1') {
      rows[0] = readValues(body)[0];
      this.tabs.set(tab, rows);
      return json({ updatedRows: 1 });
    }
    if (method === 'POST' && append) {
      rows.push(...readValues(body));
      this.tabs.set(tab, rows);
      return json({ updates: { updatedRows: readValues(body).length } });
    }
    return json({ error: 'unexpected call' }, 400);
  });
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

const AddSheetBodySchema = z.object({
  requests: z.array(z.object({ addSheet: z.object({ properties: z.object({ title: z.string() }) }) })),
});

const ValuesBodySchema = z.object({
  values: z.array(z.array(z.union([z.string(), z.number()]))),
});

function readAddSheetTitle(body: unknown): string {
  return AddSheetBodySchema.parse(body).requests[0].addSheet.properties.title;
}

function readValues(body: unknown): Array<Array<string | number>> {
  return ValuesBodySchema.parse(body).values;
}

const tokens: TokenProvider = { getAccessToken: async () => 'test-token' };

function createRow(identity: string): LedgerRow {
  return [identity, 'Corner Cafe', 'CLOSED_TEMPORARILY', null, 35.05, -85.31, 'cafe', 4.2, 10, 'cafe', null, null];
}

// ============================================================================
// Tests
// ============================================================================

describe('assertRawTab', () => {
  it('accepts tabs ending in _Raw', () => {
    expect(() => assertRawTab('Medellin_Raw')).not.toThrow();
  });

  it('refuses any other tab', () => {
    expect(() => assertRawTab('Medellin_View')).toThrow(LedgerTargetError);
    expect(() => assertRawTab('Medellin_View')).toThrow(
      "Refusing to write: target tab 'Medellin_View' must end with '_Raw'"
    );
  });
});

describe('a1Range', () => {
  it('quotes the tab title', () => {
    expect(a1Range("Bob's_Raw", 'A:A')).toBe("'Bob''s_Raw'!A:A");
  });
});

describe('SheetsLedger', () => {
  let sheets: FakeSheets;
  let ledger: SheetsLedger;

  beforeEach(() => {
    sheets = new FakeSheets();
    ledger = new SheetsLedger('test-sheet', tokens, { fetchImpl: sheets.fetch });
  });

  it('refuses a non-raw tab before any request', async () => {
    await expect(ledger.ensureTab('Chattanooga', LEDGER_HEADERS)).rejects.toThrow(LedgerTargetError);
    expect(sheets.fetch).not.toHaveBeenCalled();
  });

  it('creates a missing tab sized for the headers and writes the header row', async () => {
    await ledger.ensureTab('Chattanooga_Raw', LEDGER_HEADERS);

    const addSheet = sheets.calls.find((call) => call.url.endsWith(':batchUpdate'));
    expect(addSheet?.body).toEqual({
      requests: [
        {
          addSheet: {
            properties: {
              title: 'Chattanooga_Raw',
              gridProperties: { rowCount: 100, columnCount: 12 },
            },
          },
        },
      ],
    });
    expect(sheets.tabs.get('Chattanooga_Raw')).toEqual([[...LEDGER_HEADERS]]);
  });

  it('sends the bearer token', async () => {
    await ledger.ensureTab('Chattanooga_Raw', LEDGER_HEADERS);

    const init = sheets.fetch.mock.calls[0][1];
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      'Content-Type': 'application/json',
    });
  });

  it('adds headers to an existing empty tab without recreating it', async () => {
    sheets.tabs.set('Medellin_Raw', []);

    await ledger.ensureTab('Medellin_Raw', LEDGER_HEADERS);

    expect(sheets.calls.some((call) => call.url.endsWith(':batchUpdate'))).toBe(false);
    expect(sheets.tabs.get('Medellin_Raw')).toEqual([[...LEDGER_HEADERS]]);
  });

  it('leaves an existing header row alone', async () => {
    sheets.tabs.set('Medellin_Raw', [[...LEDGER_HEADERS], ['existing']]);

    await ledger.ensureTab('Medellin_Raw', LEDGER_HEADERS);

    expect(sheets.calls.some((call) => call.method === 'PUT')).toBe(false);
  });

  it('reads the identity column including the header', async () => {
    sheets.tabs.set('Medellin_Raw', [[...LEDGER_HEADERS], ['a'], ['b']]);

    const tab = await ledger.ensureTab('Medellin_Raw', LEDGER_HEADERS);

    expect(await tab.readIdentityColumn()).toEqual(['place_id', 'a', 'b']);
  });

  it('appends rows as RAW with empty cells for nulls', async () => {
    const tab = await ledger.ensureTab('Chattanooga_Raw', LEDGER_HEADERS);

    await tab.appendRows([createRow('p1')]);

    const append = sheets.calls.find((call) => call.url.includes(':append'));
    expect(append?.method).toBe('POST');
    expect(append?.url).toContain('valueInputOption=RAW');
    expect(sheets.tabs.get('Chattanooga_Raw')?.[1]).toEqual([
      'p1',
      'Corner Cafe',
      'CLOSED_TEMPORARILY',
      '',
      35.05,
      -85.31,
      'cafe',
      4.2,
      10,
      'cafe',
      '',
      '',
    ]);
  });

  it('skips the request for an empty append', async () => {
    const tab = await ledger.ensureTab('Chattanooga_Raw', LEDGER_HEADERS);
    const before = sheets.calls.length;

    await tab.appendRows([]);

    expect(sheets.calls.length).toBe(before);
  });

  it('throws LedgerError on an API failure', async () => {
    sheets.failWith = 403;

    await expect(ledger.ensureTab('Chattanooga_Raw', LEDGER_HEADERS)).rejects.toThrow(LedgerError);
    await expect(ledger.ensureTab('Chattanooga_Raw', LEDGER_HEADERS)).rejects.toThrow(
      'Sheets API error (403)'
    );
  });
});
