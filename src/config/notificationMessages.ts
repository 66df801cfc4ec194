/**
 * Message templates for rate notifications (Telegram HTML parse mode)
 */

import { formatInTimeZone } from 'date-fns-tz';
import { MAX_BANKS_PER_MESSAGE } from '../lib/constants.js';
import type { ExchangeRateRecord } from '../types/rates.js';
import { RATES_SOURCE_LABEL } from './scraperConfig.js';

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function noDataMessage(currency: string): string {
  return `No exchange rate data available for ${currency.toUpperCase()}`;
}

function formatBank(record: ExchangeRateRecord): string {
  const lines = [`<b>${escapeHtml(record.bank)}</b>`];

  if (record.cashBuy && record.cashSell) {
    lines.push(`💵 Cash: Buy ${escapeHtml(record.cashBuy)} / Sell ${escapeHtml(record.cashSell)}`);
  }

  if (record.cardBuy && record.cardSell) {
    lines.push(`💳 Card: Buy ${escapeHtml(record.cardBuy)} / Sell ${escapeHtml(record.cardSell)}`);
  }

  lines.push(`⏱ Updated: ${escapeHtml(record.updateTime ?? 'N/A')}`);
  return lines.join('\n');
}

export function formatExchangeRates(
  records: readonly ExchangeRateRecord[],
  currency: string,
  now: Date = new Date(),
  timezone = 'UTC'
): string {
  if (records.length === 0) {
    return noDataMessage(currency);
  }

  const code = currency.toUpperCase();
  const sections = [
    `🏦 <b>Exchange Rates for ${code}</b>`,
    `<i>Last updated: ${formatInTimeZone(now, timezone, 'yyyy-MM-dd HH:mm')}</i>`,
    ...records.slice(0, MAX_BANKS_PER_MESSAGE).map(formatBank),
    `<i>Data from ${RATES_SOURCE_LABEL}</i>`,
  ];

  return sections.join('\n\n');
}
