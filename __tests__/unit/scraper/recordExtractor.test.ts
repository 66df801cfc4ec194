import * as cheerio from 'cheerio';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  buildRecord,
  extractRecords,
  readTableHeaders,
  sortByCashSell,
} from '../../../src/scraper/recordExtractor.js';
import { locateRatesTable } from '../../../src/scraper/tableLocator.js';
import type { ExchangeRateRecord } from '../../../src/types/rates.js';
import { logger } from '../../../src/utils/logger.js';
import { ratesPage, ratesTable } from '../../fixtures/ratesPage.js';

function extractFrom(rows: string[][], currency = 'usd'): ExchangeRateRecord[] {
  const $ = cheerio.load(ratesPage(ratesTable(rows)));
  const table = locateRatesTable($);
  if (!table) {
    throw new Error('fixture table not found');
  }
  return extractRecords($, table, currency, readTableHeaders($, table));
}

describe('buildRecord', () => {
  it('maps cells by fixed position', () => {
    expect(buildRecord(['BankA', '41.10', '+0.05', '41.60', '41.05', '-0.01', '41.70', '12:00'], 'usd')).toEqual({
      bank: 'BankA',
      currency: 'USD',
      cashBuy: '41.10',
      cashSell: '41.60',
      cardBuy: '41.05',
      cardSell: '41.70',
      updateTime: '12:00',
    });
  });

  it('leaves update time absent when the row has no eighth cell', () => {
    const record = buildRecord(['BankA', '41.10', '', '41.60', '41.05'], 'eur');
    expect(record.updateTime).toBeUndefined();
    expect(record.cardSell).toBeUndefined();
    expect(record.currency).toBe('EUR');
  });
});

describe('extractRecords', () => {
  it('extracts a row with placeholder cells as absent fields', () => {
    const records = extractFrom([['BankA', '27.5', '-', '-', '27.9', '-', '-', '12:00']]);

    expect(records).toHaveLength(1);
    expect(records[0]).toEqual({
      bank: 'BankA',
      currency: 'USD',
      cashBuy: '27.5',
      cardBuy: '27.9',
      updateTime: '12:00',
    });
    expect(records[0]?.cashSell).toBeUndefined();
    expect(records[0]?.cardSell).toBeUndefined();
  });

  it('reads the cash sell rate from the fourth cell', () => {
    const [record] = extractFrom([['BankA', '27.5', '-', '27.9', '-', '-', '-', '12:00']]);

    expect(record?.cashBuy).toBe('27.5');
    expect(record?.cashSell).toBe('27.9');
    expect(record?.cardBuy).toBeUndefined();
    expect(record?.cardSell).toBeUndefined();
  });

  it('normalizes empty cells to absent rather than empty strings', () => {
    const [record] = extractFrom([['BankE', '', '', '', '', '', '', '']]);

    expect(record?.bank).toBe('BankE');
    expect(record?.cashBuy).toBeUndefined();
    expect(record?.cashSell).toBeUndefined();
    expect(record?.cardBuy).toBeUndefined();
    expect(record?.cardSell).toBeUndefined();
    expect(record?.updateTime).toBeUndefined();
  });

  it('trims whitespace around cell text', () => {
    const [record] = extractFrom([['  BankT\n', ' 41.10 ', '', '\n41.60', '41.05', '', '41.70', ' 09:15 ']]);

    expect(record).toEqual({
      bank: 'BankT',
      currency: 'USD',
      cashBuy: '41.10',
      cashSell: '41.60',
      cardBuy: '41.05',
      cardSell: '41.70',
      updateTime: '09:15',
    });
  });

  it('orders records by ascending cash sell rate', () => {
    const records = extractFrom([
      ['BankHigh', '27.1', '', '27.9', '', '', '', '10:00'],
      ['BankLow', '27.0', '', '27.5', '', '', '', '10:05'],
    ]);

    expect(records.map(record => record.bank)).toEqual(['BankLow', 'BankHigh']);
  });

  it('puts absent and unparsable cash sell rates last, keeping their order', () => {
    const records = extractFrom([
      ['NoSell', '41.0', '', '-', '', '', '', ''],
      ['Garbled', '41.0', '', 'n/a', '', '', '', ''],
      ['Dearer', '41.0', '', '41.20', '', '', '', ''],
      ['Cheaper', '41.0', '', '40.90', '', '', '', ''],
    ]);

    expect(records.map(record => record.bank)).toEqual(['Cheaper', 'Dearer', 'NoSell', 'Garbled']);
  });

  it('skips rows with fewer than five cells', () => {
    const records = extractFrom([
      ['BankA', '41.0', '', '41.5', '41.1'],
      ['Average', '41.2', '41.6', '41.3'],
      ['Footer'],
    ]);

    expect(records.map(record => record.bank)).toEqual(['BankA']);
  });

  it('returns an empty list for a table without body rows', () => {
    expect(extractFrom([])).toEqual([]);
  });
});

describe('extractRecords column layout checks', () => {
  beforeEach(() => {
    logger.setLevel('warn');
  });

  afterEach(() => {
    logger.setLevel('error');
    vi.restoreAllMocks();
  });

  function layoutWarnings(): string[] {
    return vi
      .mocked(console.warn)
      .mock.calls.map(([line]) => String(line))
      .filter(line => line.includes('[RecordExtractor] Subheader has'));
  }

  it('stays quiet when rows match the subheader', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    extractFrom([['BankA', '41.10', '', '41.60', '41.05', '', '41.70', '12:00']]);

    expect(layoutWarnings()).toEqual([]);
  });

  it('warns once when body rows are wider than the subheader', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const records = extractFrom([
      ['BankA', '41.10', '', '41.60', '41.05', '', '41.70', '12:00', 'extra'],
      ['BankB', '41.20', '', '41.65', '41.10', '', '41.75', '12:05', 'extra'],
    ]);

    const warnings = layoutWarnings();
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain('Subheader has 8 columns but row 1 has 9');
    expect(records.map(record => record.cashSell)).toEqual(['41.60', '41.65']);
  });

  it('warns when the subheader is too narrow for the mapped columns', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const $ = cheerio.load(
      '<table id="smTable"><thead><tr><th>Bank</th><th>Cash</th></tr>' +
        '<tr><th></th><th>Buy</th><th>Sell</th><th>Buy</th><th>Sell</th></tr></thead>' +
        '<tbody><tr><td>BankA</td><td>41.10</td><td>41.60</td><td>41.05</td><td>41.70</td></tr></tbody></table>'
    );
    const table = locateRatesTable($);
    if (!table) {
      throw new Error('fixture table not found');
    }

    const records = extractRecords($, table, 'usd', readTableHeaders($, table));

    expect(layoutWarnings()).toEqual([
      expect.stringContaining('Subheader has 5 columns, expected at least 8'),
    ]);
    expect(records).toEqual([
      { bank: 'BankA', currency: 'USD', cashBuy: '41.10', cashSell: '41.05', cardBuy: '41.70' },
    ]);
  });
});

describe('readTableHeaders', () => {
  it('returns header and subheader texts', () => {
    const $ = cheerio.load(ratesPage(ratesTable([])));
    const table = locateRatesTable($);
    if (!table) {
      throw new Error('fixture table not found');
    }

    const headers = readTableHeaders($, table);
    expect(headers.header).toEqual(['Bank', 'Cash', 'Card', 'Time']);
    expect(headers.subheader).toEqual(['', 'Buy', '', 'Sell', 'Buy', '', 'Sell', '']);
  });

  it('tolerates a table without a header section', () => {
    const $ = cheerio.load('<table id="smTable"><tbody><tr><td>a</td></tr></tbody></table>');
    const table = locateRatesTable($);
    if (!table) {
      throw new Error('fixture table not found');
    }

    expect(readTableHeaders($, table)).toEqual({ header: [], subheader: [] });
  });
});

describe('sortByCashSell', () => {
  it('does not mutate its input', () => {
    const input: ExchangeRateRecord[] = [
      { bank: 'B', currency: 'USD', cashSell: '2' },
      { bank: 'A', currency: 'USD', cashSell: '1' },
    ];

    const sorted = sortByCashSell(input);

    expect(sorted.map(record => record.bank)).toEqual(['A', 'B']);
    expect(input.map(record => record.bank)).toEqual(['B', 'A']);
  });
});
