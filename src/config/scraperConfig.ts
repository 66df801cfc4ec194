// Identity strings rotated on every request attempt
export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.4 Safari/605.1.15',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:125.0) Gecko/20100101 Firefox/125.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36',
] as const;

export const ACCEPT_LANGUAGE = 'en-US,en;q=0.9,uk;q=0.8,ru;q=0.7';

// Markers of the bank rates table on the source page
export const RATES_TABLE_ID = 'smTable';
export const RATES_TABLE_CLASS = 'mfcur-table-sm-banks';

// Footer and merged-cell rows carry fewer cells than this
export const MIN_ROW_CELLS = 5;

// Fixed column positions of the rates table body
export const RATE_COLUMNS = {
  bank: 0,
  cashBuy: 1,
  cashSell: 3,
  cardBuy: 4,
  cardSell: 6,
  updateTime: 7,
} as const;

export const PLACEHOLDER_VALUE = '-';

export const RATES_SOURCE_LABEL = 'minfin.com.ua';
