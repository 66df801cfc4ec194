import { ACCEPT_LANGUAGE, USER_AGENTS } from '../config/scraperConfig.js';
import { delay } from '../utils/delay.js';
import { describeError, FetchError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('PageFetcher');

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface PageFetcherOptions {
  baseUrl: string;
  maxRetries?: number;
  retryDelayMs?: number;
  requestTimeoutMs?: number;
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/**
 * Downloads a currency rates page for a city.
 * Retries with a fixed delay and picks a fresh User-Agent on every attempt.
 */
export class PageFetcher {
  private readonly baseUrl: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly requestTimeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(options: PageFetcherOptions) {
    this.baseUrl = options.baseUrl;
    this.maxRetries = Math.max(1, options.maxRetries ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 2000;
    this.requestTimeoutMs = options.requestTimeoutMs ?? 30000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? (ms => delay(ms));
    this.random = options.random ?? Math.random;
  }

  buildUrl(currency: string, city: string): string {
    return `${this.baseUrl}${city.toLowerCase()}/${currency.toLowerCase()}/`;
  }

  /**
   * Fetch the raw page markup.
   * @throws FetchError once all attempts have failed
   */
  async fetch(currency: string, city: string): Promise<string> {
    const url = this.buildUrl(currency, city);
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt++) {
      try {
        logger.debug(`GET ${url} (attempt ${attempt}/${this.maxRetries})`);
        const response = await this.fetchImpl(url, {
          headers: this.buildHeaders(),
          redirect: 'follow',
          signal: AbortSignal.timeout(this.requestTimeoutMs),
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status} ${response.statusText}`.trim());
        }

        return await response.text();
      } catch (error) {
        lastError = error;

        if (attempt < this.maxRetries) {
          logger.warn(
            `Request to ${url} failed: ${describeError(error)}. Retrying in ${this.retryDelayMs}ms (attempt ${attempt + 1}/${this.maxRetries})`
          );
          await this.sleep(this.retryDelayMs);
        }
      }
    }

    const message = `Failed to fetch ${url} after ${this.maxRetries} attempts: ${describeError(lastError)}`;
    logger.error(message);
    throw new FetchError(message, url, this.maxRetries, { cause: lastError });
  }

  private buildHeaders(): Record<string, string> {
    return {
      'Accept-Language': ACCEPT_LANGUAGE,
      'User-Agent': this.pickUserAgent(),
    };
  }

  private pickUserAgent(): string {
    const index = Math.min(USER_AGENTS.length - 1, Math.floor(this.random() * USER_AGENTS.length));
    return USER_AGENTS[index] ?? USER_AGENTS[0];
  }
}
