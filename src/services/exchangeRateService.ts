import * as cheerio from 'cheerio';
import { PageFetcher } from '../scraper/pageFetcher.js';
import { extractRecords, readTableHeaders } from '../scraper/recordExtractor.js';
import { locateRatesTable } from '../scraper/tableLocator.js';
import type { ExchangeRateRecord, RateSource } from '../types/rates.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('ExchangeRateService');

/**
 * Fetches bank exchange rates for a currency and turns the page into records.
 * Holds no per-call state, so concurrent calls are independent.
 */
export class ExchangeRateService implements RateSource {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly city: string
  ) {}

  /**
   * Rates for `currency`, ordered by cash sell rate. Resolves to an empty list
   * on any fetch or parse failure.
   */
  async getExchangeRates(currency: string, city: string = this.city): Promise<ExchangeRateRecord[]> {
    try {
      const markup = await this.fetcher.fetch(currency, city);
      const records = this.parseExchangeRates(markup, currency);
      logger.info(`Extracted ${records.length} bank rates for ${currency.toUpperCase()} (${city})`);
      return records;
    } catch (error) {
      logger.error(`Error fetching exchange rates for ${currency.toUpperCase()}:`, error);
      return [];
    }
  }

  /**
   * Rates for several currencies fetched concurrently, keyed by the requested code.
   */
  async getManyExchangeRates(currencies: readonly string[]): Promise<Map<string, ExchangeRateRecord[]>> {
    const results = await Promise.all(
      currencies.map(async currency => [currency, await this.getExchangeRates(currency)] as const)
    );
    return new Map(results);
  }

  parseExchangeRates(markup: string, currency: string): ExchangeRateRecord[] {
    const $ = cheerio.load(markup);
    const table = locateRatesTable($);

    if (!table) {
      return [];
    }

    const headers = readTableHeaders($, table);
    return extractRecords($, table, currency, headers);
  }
}
