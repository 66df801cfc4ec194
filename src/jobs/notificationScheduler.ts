import { formatExchangeRates } from '../config/notificationMessages.js';
import { getSchedulerClock, type SchedulerClock } from '../lib/dateUtils.js';
import { WEEKLY_DELIVERY_DAY } from '../lib/constants.js';
import type { Subscription } from '../models/subscription.js';
import type { NotificationDelivery } from '../services/telegramDeliveryService.js';
import type { SubscriptionStore } from '../stores/subscriptionStore.js';
import type { ExchangeRateRecord, RateSource } from '../types/rates.js';
import { delay } from '../utils/delay.js';
import { describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('NotificationScheduler');

export type SchedulerState = 'stopped' | 'running' | 'sleeping';

export interface TickSummary {
  startedAt: string;
  clock: SchedulerClock;
  dueSubscriptions: number;
  sent: number;
  failed: number;
  /** true when stop() interrupted the tick before every due subscription was handled */
  cancelled: boolean;
}

export interface NotificationSchedulerOptions {
  intervalMs?: number;
  timezone?: string;
  now?: () => Date;
}

/**
 * A subscription is due when its time equals the tick's HH:MM exactly and,
 * for weekly schedules, the tick falls on the weekly delivery day.
 */
export function isDue(subscription: Subscription, clock: SchedulerClock): boolean {
  if (subscription.time !== clock.time) {
    return false;
  }
  return subscription.schedule === 'daily' || clock.weekday === WEEKLY_DELIVERY_DAY;
}

/**
 * Once per interval, sends every due subscriber the current rates for each of
 * their currencies. Failures are isolated per (user, currency); only stop() ends the loop.
 */
export class NotificationScheduler {
  private readonly intervalMs: number;
  private readonly timezone: string;
  private readonly now: () => Date;

  private state: SchedulerState = 'stopped';
  private abortController: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private currentTick: Promise<TickSummary> | null = null;
  private lastTick: TickSummary | null = null;

  constructor(
    private readonly store: SubscriptionStore,
    private readonly rates: RateSource,
    private readonly delivery: NotificationDelivery,
    options: NotificationSchedulerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 60_000;
    this.timezone = options.timezone ?? 'UTC';
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.loop) {
      logger.warn('Scheduler already running, skipping...');
      return;
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.loop = this.run(controller.signal);
    logger.info(`Scheduler started (interval ${this.intervalMs}ms, timezone ${this.timezone})`);
  }

  /**
   * Cancel the loop at its next suspension point and wait for the final save.
   */
  async stop(): Promise<void> {
    if (!this.loop || !this.abortController) {
      return;
    }

    logger.info('Stopping scheduler...');
    this.abortController.abort();
    await this.loop;
    this.loop = null;
    this.abortController = null;
  }

  isRunning(): boolean {
    return this.loop !== null;
  }

  getStatus(): {
    state: SchedulerState;
    intervalMs: number;
    timezone: string;
    subscriptions: number;
    lastTick: TickSummary | null;
  } {
    return {
      state: this.state,
      intervalMs: this.intervalMs,
      timezone: this.timezone,
      subscriptions: this.store.count(),
      lastTick: this.lastTick,
    };
  }

  /**
   * Run one scan. A call made while a scan is in progress joins that scan.
   * A scan started while the loop runs ends early once stop() is called.
   */
  runTick(now: Date = this.now()): Promise<TickSummary> {
    if (this.currentTick) {
      return this.currentTick;
    }

    const tick = this.scan(now, this.abortController?.signal).finally(() => {
      this.currentTick = null;
    });
    this.currentTick = tick;
    return tick;
  }

  private async run(signal: AbortSignal): Promise<void> {
    try {
      while (!signal.aborted) {
        this.state = 'running';
        try {
          await this.runTick();
        } catch (error) {
          logger.error('Error in scheduled notification tick:', error);
        }

        if (signal.aborted) {
          break;
        }

        this.state = 'sleeping';
        await delay(this.intervalMs, signal);
      }
      logger.info('Scheduler loop cancelled');
    } finally {
      this.state = 'stopped';
      this.store.save();
    }
  }

  private async scan(now: Date, signal?: AbortSignal): Promise<TickSummary> {
    const clock = getSchedulerClock(now, this.timezone);
    const due = this.store.all().filter(([, subscription]) => isDue(subscription, clock));

    let sent = 0;
    let failed = 0;
    let handled = 0;

    for (const [userId, subscription] of due) {
      if (signal?.aborted) {
        logger.info(`Tick ${clock.time} cancelled, ${due.length - handled} due subscriptions skipped`);
        break;
      }

      const result = await this.notifyUser(userId, subscription, now, signal);
      sent += result.sent;
      failed += result.failed;
      handled++;
    }

    if (due.length > 0) {
      logger.info(`Tick ${clock.time}: ${due.length} due subscriptions, ${sent} sent, ${failed} failed`);
    }

    const summary: TickSummary = {
      startedAt: now.toISOString(),
      clock,
      dueSubscriptions: due.length,
      sent,
      failed,
      cancelled: handled < due.length,
    };
    this.lastTick = summary;
    return summary;
  }

  /**
   * Rates for all of the user's currencies are fetched together, then
   * delivered one message per currency in subscription order.
   */
  private async notifyUser(
    userId: string,
    subscription: Subscription,
    now: Date,
    signal?: AbortSignal
  ): Promise<{ sent: number; failed: number }> {
    const fetched = await Promise.allSettled(
      subscription.currencies.map(currency => this.rates.getExchangeRates(currency))
    );

    let sent = 0;
    let failed = 0;

    for (const [index, currency] of subscription.currencies.entries()) {
      if (signal?.aborted) {
        break;
      }

      try {
        const records = this.unwrap(fetched[index]);
        const message = formatExchangeRates(records, currency, now, this.timezone);
        const result = await this.delivery.send(userId, message);

        if (!result.success) {
          throw new Error(result.error ?? 'Delivery failed');
        }

        logger.info(`Sent notification to ${userId} for ${currency.toUpperCase()}`);
        sent++;
      } catch (error) {
        logger.error(`Error sending notification to ${userId} for ${currency.toUpperCase()}: ${describeError(error)}`);
        failed++;
      }
    }

    return { sent, failed };
  }

  private unwrap(result: PromiseSettledResult<ExchangeRateRecord[]> | undefined): ExchangeRateRecord[] {
    if (!result) {
      throw new Error('Missing rates result');
    }
    if (result.status === 'rejected') {
      throw result.reason;
    }
    return result.value;
  }
}
