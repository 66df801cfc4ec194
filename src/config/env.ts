import dotenv from 'dotenv';
import { z } from 'zod';
import { isValidTimeZone } from '../lib/dateUtils.js';
import { LOG_LEVELS, type LogLevel } from '../utils/logger.js';

dotenv.config();

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform(value => (value === '' ? undefined : value));

const currencyList = z
  .string()
  .transform(value =>
    [...new Set(value.split(',').map(currency => currency.trim().toLowerCase()).filter(Boolean))]
  )
  .refine(currencies => currencies.length > 0, 'At least one currency is required');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  RATES_BASE_URL: z.string().url().default('https://minfin.com.ua/currency/banks/'),
  RATES_CITY: z.string().trim().min(1).default('kiev'),
  RATES_MAX_RETRIES: z.coerce.number().int().min(1).default(3),
  RATES_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(2000),
  RATES_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  DEFAULT_CURRENCIES: currencyList.default('usd,eur'),

  SUBSCRIPTIONS_FILE: z.string().trim().min(1).default('data/subscriptions.json'),
  EXPORT_DIR: z.string().trim().min(1).default('data/exports'),
  EXPORT_CRON: optionalString,

  SCHEDULER_TIMEZONE: z.string().trim().min(1).refine(isValidTimeZone, 'Unknown time zone').default('UTC'),
  SCHEDULER_INTERVAL_MS: z.coerce.number().int().positive().default(60000),

  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_API_BASE: z.string().url().default('https://api.telegram.org'),
  ADMIN_API_TOKEN: optionalString,
  CORS_ORIGIN: optionalString,
});

export interface AppConfig {
  env: 'development' | 'production' | 'test';
  port: number;
  logLevel: LogLevel;
  rates: {
    baseUrl: string;
    city: string;
    maxRetries: number;
    retryDelayMs: number;
    requestTimeoutMs: number;
    defaultCurrencies: string[];
  };
  subscriptionsFile: string;
  exports: {
    dir: string;
    cron?: string;
  };
  scheduler: {
    timezone: string;
    intervalMs: number;
  };
  telegram: {
    botToken?: string;
    apiBase: string;
  };
  adminToken?: string;
  corsOrigin?: string;
}

/**
 * Parse and validate environment variables. Throws a ZodError listing every invalid key.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,
    rates: {
      // the page path is appended directly, so the base must end with a slash
      baseUrl: parsed.RATES_BASE_URL.endsWith('/') ? parsed.RATES_BASE_URL : `${parsed.RATES_BASE_URL}/`,
      city: parsed.RATES_CITY.toLowerCase(),
      maxRetries: parsed.RATES_MAX_RETRIES,
      retryDelayMs: parsed.RATES_RETRY_DELAY_MS,
      requestTimeoutMs: parsed.RATES_REQUEST_TIMEOUT_MS,
      defaultCurrencies: parsed.DEFAULT_CURRENCIES,
    },
    subscriptionsFile: parsed.SUBSCRIPTIONS_FILE,
    exports: {
      dir: parsed.EXPORT_DIR,
      cron: parsed.EXPORT_CRON,
    },
    scheduler: {
      timezone: parsed.SCHEDULER_TIMEZONE,
      intervalMs: parsed.SCHEDULER_INTERVAL_MS,
    },
    telegram: {
      botToken: parsed.TELEGRAM_BOT_TOKEN,
      apiBase: parsed.TELEGRAM_API_BASE.replace(/\/+$/, ''),
    },
    adminToken: parsed.ADMIN_API_TOKEN,
    corsOrigin: parsed.CORS_ORIGIN,
  };
}
