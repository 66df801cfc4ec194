import type { RateExportService } from '../services/rateExportService.js';
import type { ExchangeRateService } from '../services/exchangeRateService.js';
import { logger } from '../utils/logger.js';

/**
 * Fetch every currency concurrently and write CSV and JSON snapshots of each
 */
export async function runRateExport(
  rates: ExchangeRateService,
  exporter: RateExportService,
  currencies: readonly string[],
  now: Date = new Date()
): Promise<{ currencies: number; filesWritten: number; empty: number }> {
  logger.info(`[Rate Export] Exporting rates for ${currencies.map(c => c.toUpperCase()).join(', ')}...`);

  const results = await rates.getManyExchangeRates(currencies);

  let filesWritten = 0;
  let empty = 0;

  for (const [currency, records] of results) {
    if (records.length === 0) {
      logger.warn(`[Rate Export] No data was collected for ${currency.toUpperCase()}`);
      empty++;
      continue;
    }

    const written = await Promise.all([
      exporter.exportRates(records, currency, 'csv', now),
      exporter.exportRates(records, currency, 'json', now),
    ]);
    filesWritten += written.filter(filePath => filePath !== null).length;
  }

  logger.info(`[Rate Export] Completed: ${results.size} currencies, ${filesWritten} files written, ${empty} empty`);
  return { currencies: results.size, filesWritten, empty };
}
