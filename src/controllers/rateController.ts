import { NextFunction, Request, Response } from 'express';
import { createError } from '../middleware/errorHandler.js';
import type { ExchangeRateService } from '../services/exchangeRateService.js';
import type { RateExportService } from '../services/rateExportService.js';
import type { ExportFormat } from '../types/rates.js';
import { toSingleString } from '../utils/express-utils.js';
import { successResponse } from '../utils/response.js';

const CURRENCY_CODE_PATTERN = /^[a-z]{3}$/;

function parseCurrency(value: unknown): string {
  const currency = toSingleString(value)?.trim().toLowerCase();
  if (!currency || !CURRENCY_CODE_PATTERN.test(currency)) {
    throw createError('Currency must be a three-letter code', 400, 'INVALID_CURRENCY');
  }
  return currency;
}

export class RateController {
  constructor(
    private readonly rates: ExchangeRateService,
    private readonly exporter: RateExportService
  ) {}

  // GET /api/rates/:currency - Current bank rates for a currency
  getRates = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const currency = parseCurrency(req.params.currency);
      const records = await this.rates.getExchangeRates(currency);

      if (records.length === 0) {
        throw createError(`No exchange rate data available for ${currency.toUpperCase()}`, 404, 'NO_DATA');
      }

      successResponse(res, records, 200, { total: records.length });
    } catch (error) {
      next(error);
    }
  };

  // GET /api/rates/:currency/export?format=csv|json - Download a rates snapshot
  exportRates = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const currency = parseCurrency(req.params.currency);
      const requested = toSingleString(req.query.format) ?? 'csv';
      if (requested !== 'csv' && requested !== 'json') {
        throw createError('Format must be csv or json', 400, 'INVALID_FORMAT');
      }
      const format: ExportFormat = requested;

      const records = await this.rates.getExchangeRates(currency);
      if (records.length === 0) {
        throw createError(`No exchange rate data available for ${currency.toUpperCase()}`, 404, 'NO_DATA');
      }

      res.setHeader('Content-Type', format === 'csv' ? 'text/csv; charset=utf-8' : 'application/json; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${this.exporter.buildFileName(currency, format)}"`);
      res.send(this.exporter.render(records, format));
    } catch (error) {
      next(error);
    }
  };
}
