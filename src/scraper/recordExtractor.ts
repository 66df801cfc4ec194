import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { MIN_ROW_CELLS, PLACEHOLDER_VALUE, RATE_COLUMNS } from '../config/scraperConfig.js';
import type { ExchangeRateRecord } from '../types/rates.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('RecordExtractor');

// Cells a row needs to reach every mapped column
const LAYOUT_WIDTH = Math.max(...Object.values(RATE_COLUMNS)) + 1;

export interface TableHeaders {
  header: string[];
  subheader: string[];
}

function cellTexts($: CheerioAPI, row: Cheerio<Element>): string[] {
  return row
    .children('th, td')
    .toArray()
    .map(cell => $(cell).text().trim());
}

/**
 * Read the two header rows. They are informational only: columns are mapped by position.
 */
export function readTableHeaders($: CheerioAPI, table: Cheerio<Element>): TableHeaders {
  const rows = table.children('thead').children('tr');

  if (rows.length < 2) {
    logger.warn(`Expected two header rows, found ${rows.length}`);
  }

  const header = rows.length > 0 ? cellTexts($, rows.eq(0)) : [];
  const subheader = rows.length > 1 ? cellTexts($, rows.eq(1)) : [];

  logger.debug(`Header cells: ${JSON.stringify(header)}`);
  logger.debug(`Subheader cells: ${JSON.stringify(subheader)}`);

  return { header, subheader };
}

function optionalValue(values: readonly string[], index: number): string | undefined {
  const value = values[index];
  if (value === undefined || value === '' || value === PLACEHOLDER_VALUE) {
    return undefined;
  }
  return value;
}

/**
 * Map trimmed cell texts of one body row to a record by fixed column position.
 */
export function buildRecord(values: readonly string[], currency: string): ExchangeRateRecord {
  const bank = values[RATE_COLUMNS.bank];
  if (bank === undefined) {
    throw new Error('Row has no bank name cell');
  }

  return {
    bank,
    currency: currency.toUpperCase(),
    cashBuy: optionalValue(values, RATE_COLUMNS.cashBuy),
    cashSell: optionalValue(values, RATE_COLUMNS.cashSell),
    cardBuy: optionalValue(values, RATE_COLUMNS.cardBuy),
    cardSell: optionalValue(values, RATE_COLUMNS.cardSell),
    updateTime: optionalValue(values, RATE_COLUMNS.updateTime),
  };
}

function cashSellKey(record: ExchangeRateRecord): number {
  if (record.cashSell === undefined) {
    return Number.POSITIVE_INFINITY;
  }
  const value = Number(record.cashSell);
  return Number.isFinite(value) ? value : Number.POSITIVE_INFINITY;
}

/**
 * Stable ascending sort by numeric cash sell rate. Missing or unparsable rates go last.
 */
export function sortByCashSell(records: readonly ExchangeRateRecord[]): ExchangeRateRecord[] {
  return [...records].sort((a, b) => {
    const left = cashSellKey(a);
    const right = cashSellKey(b);
    if (left === right) {
      return 0;
    }
    return left < right ? -1 : 1;
  });
}

/**
 * Turn the body rows of the rates table into sorted records.
 * Short rows are skipped; a row that fails to map is logged and dropped.
 * Layout mismatches against the subheader are logged once; mapping stays positional.
 */
export function extractRecords(
  $: CheerioAPI,
  table: Cheerio<Element>,
  currency: string,
  headers: TableHeaders
): ExchangeRateRecord[] {
  const rows = table.children('tbody').children('tr').toArray();
  const records: ExchangeRateRecord[] = [];
  const headerWidth = headers.subheader.length;
  let mismatchLogged = false;

  if (headerWidth > 0 && headerWidth < LAYOUT_WIDTH) {
    logger.warn(`Subheader has ${headerWidth} columns, expected at least ${LAYOUT_WIDTH}`);
  }

  for (const [index, element] of rows.entries()) {
    const row = $(element);
    const width = row.children('th, td').length;
    if (width < MIN_ROW_CELLS) {
      continue;
    }

    if (headerWidth > 0 && width !== headerWidth && !mismatchLogged) {
      logger.warn(`Subheader has ${headerWidth} columns but row ${index + 1} has ${width}`);
      mismatchLogged = true;
    }

    try {
      const record = buildRecord(cellTexts($, row), currency);
      logger.debug(
        `Added ${record.bank}: cash ${record.cashBuy ?? '-'}/${record.cashSell ?? '-'}, card ${record.cardBuy ?? '-'}/${record.cardSell ?? '-'}, time ${record.updateTime ?? '-'}`
      );
      records.push(record);
    } catch (error) {
      logger.error(`Error processing row ${index + 1} for ${currency.toUpperCase()}:`, error);
    }
  }

  return sortByCashSell(records);
}
