import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { toFileTimestamp } from '../lib/dateUtils.js';
import type { ExchangeRateRecord, ExportFormat } from '../types/rates.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('RateExport');

const CSV_COLUMNS = ['bank', 'currency', 'cash_buy', 'cash_sell', 'card_buy', 'card_sell', 'update_time'] as const;

type SnapshotRow = Record<typeof CSV_COLUMNS[number], string | null>;

function toSnapshotRow(record: ExchangeRateRecord): SnapshotRow {
  return {
    bank: record.bank,
    currency: record.currency,
    cash_buy: record.cashBuy ?? null,
    cash_sell: record.cashSell ?? null,
    card_buy: record.cardBuy ?? null,
    card_sell: record.cardSell ?? null,
    update_time: record.updateTime ?? null,
  };
}

const escapeCsvValue = (value: string): string =>
  `"${value.replace(/"/g, '""')}"`;

/**
 * Best-effort CSV/JSON snapshots of fetched rates. Nothing here throws into callers.
 */
export class RateExportService {
  constructor(
    private readonly outputDir: string,
    private readonly timezone = 'UTC'
  ) {}

  toCsv(records: readonly ExchangeRateRecord[]): string {
    const rows = records.map(record => {
      const row = toSnapshotRow(record);
      return CSV_COLUMNS.map(column => escapeCsvValue(row[column] ?? '')).join(',');
    });

    return [CSV_COLUMNS.join(','), ...rows].join('\n');
  }

  toJson(records: readonly ExchangeRateRecord[]): string {
    return JSON.stringify(records.map(toSnapshotRow), null, 4);
  }

  render(records: readonly ExchangeRateRecord[], format: ExportFormat): string {
    return format === 'csv' ? this.toCsv(records) : this.toJson(records);
  }

  buildFileName(currency: string, format: ExportFormat, now: Date = new Date()): string {
    return `${toFileTimestamp(now, this.timezone)}_${currency.toLowerCase()}_exchange_rates.${format}`;
  }

  /**
   * Write a snapshot file and return its path, or null when there is nothing
   * to write or the write failed.
   */
  async exportRates(
    records: readonly ExchangeRateRecord[],
    currency: string,
    format: ExportFormat,
    now: Date = new Date()
  ): Promise<string | null> {
    if (records.length === 0) {
      logger.warn(`No data to save for ${currency.toUpperCase()}`);
      return null;
    }

    try {
      await mkdir(this.outputDir, { recursive: true });
      const filePath = path.join(this.outputDir, this.buildFileName(currency, format, now));
      await writeFile(filePath, this.render(records, format), 'utf-8');
      logger.info(`Data saved to ${filePath}`);
      return filePath;
    } catch (error) {
      logger.error(`Error saving ${format.toUpperCase()} data for ${currency.toUpperCase()}:`, error);
      return null;
    }
  }
}
