import type { Cheerio, CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import { RATES_TABLE_CLASS, RATES_TABLE_ID } from '../config/scraperConfig.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('TableLocator');

/**
 * Find the bank rates table: the first table, in document order, whose id is
 * the known rates id or whose class list carries the known marker.
 * Returns null when the page has no such table (unsupported currency/city).
 */
export function locateRatesTable($: CheerioAPI): Cheerio<Element> | null {
  const tables = $('table').toArray();
  logger.debug(`Found ${tables.length} tables on the page`);

  for (const [index, element] of tables.entries()) {
    const table = $(element);
    if (table.attr('id') === RATES_TABLE_ID || table.hasClass(RATES_TABLE_CLASS)) {
      logger.debug(`Using table #${index + 1} as the rates table`);
      return table;
    }
  }

  logger.warn('Could not find the exchange rates table');
  return null;
}
