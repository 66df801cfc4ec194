/**
 * One bank's quoted rates for one currency, as published at fetch time.
 * Optional fields are absent when the source shows a placeholder.
 */
export interface ExchangeRateRecord {
  readonly bank: string;
  readonly currency: string;
  readonly cashBuy?: string;
  readonly cashSell?: string;
  readonly cardBuy?: string;
  readonly cardSell?: string;
  readonly updateTime?: string;
}

export interface RateSource {
  getExchangeRates(currency: string): Promise<ExchangeRateRecord[]>;
}

export type ExportFormat = 'csv' | 'json';
