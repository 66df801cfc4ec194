import { BROADCAST_PAUSE_MS } from '../lib/constants.js';
import type { SubscriptionStore } from '../stores/subscriptionStore.js';
import type { SubscriptionStats } from '../types/api.js';
import { delay } from '../utils/delay.js';
import { logger as rootLogger } from '../utils/logger.js';
import type { NotificationDelivery } from './telegramDeliveryService.js';

const logger = rootLogger.child('AdminService');

export class AdminService {
  constructor(
    private readonly store: SubscriptionStore,
    private readonly delivery: NotificationDelivery,
    private readonly pauseMs: number = BROADCAST_PAUSE_MS
  ) {}

  /**
   * Subscriber totals with per-currency counts, most popular first
   */
  getStats(): SubscriptionStats {
    const counts = new Map<string, number>();

    for (const [, subscription] of this.store.all()) {
      for (const currency of subscription.currencies) {
        counts.set(currency, (counts.get(currency) ?? 0) + 1);
      }
    }

    return {
      totalSubscriptions: this.store.count(),
      currencies: [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .map(([currency, subscribers]) => ({ currency: currency.toUpperCase(), subscribers })),
    };
  }

  /**
   * Send one message to every subscriber, one at a time
   */
  async broadcast(message: string): Promise<{ sent: number; failed: number }> {
    const recipients = this.store.all().map(([userId]) => userId);
    let sent = 0;
    let failed = 0;

    for (const [index, userId] of recipients.entries()) {
      const result = await this.delivery.send(userId, message);
      if (result.success) {
        sent++;
      } else {
        logger.error(`Failed to send broadcast to ${userId}: ${result.error ?? 'unknown error'}`);
        failed++;
      }

      if (this.pauseMs > 0 && index < recipients.length - 1) {
        await delay(this.pauseMs);
      }
    }

    logger.info(`Broadcast complete: ${sent} sent, ${failed} failed`);
    return { sent, failed };
  }
}
