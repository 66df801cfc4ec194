import fs from 'node:fs';
import path from 'node:path';
import {
  subscriptionSchema,
  subscriptionsFileSchema,
  type Subscription,
  type SubscriptionInput,
} from '../models/subscription.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('SubscriptionStore');

/**
 * Owns the subscriber map and its JSON file. Every mutation rewrites the whole file.
 */
export class SubscriptionStore {
  private subscriptions = new Map<string, Subscription>();

  constructor(private readonly filePath: string) {}

  /**
   * Replace the in-memory map with the file contents. A missing or unreadable
   * file leaves the store empty; invalid entries are skipped.
   */
  load(): void {
    if (!fs.existsSync(this.filePath)) {
      logger.info(`No subscriptions file at ${this.filePath}, starting empty`);
      this.subscriptions = new Map();
      return;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
      const entries = subscriptionsFileSchema.parse(raw);
      const loaded = new Map<string, Subscription>();

      for (const [userId, value] of Object.entries(entries)) {
        const result = subscriptionSchema.safeParse(value);
        if (!result.success) {
          logger.warn(`Skipping invalid subscription for ${userId}: ${result.error.message}`);
          continue;
        }
        loaded.set(userId, result.data);
      }

      this.subscriptions = loaded;
      logger.info(`Loaded ${loaded.size} subscriptions`);
    } catch (error) {
      logger.error(`Error loading subscriptions from ${this.filePath}:`, error);
      this.subscriptions = new Map();
    }
  }

  /**
   * Write the full map to disk. Returns false (and logs) when the write fails;
   * the in-memory state is kept either way.
   */
  save(): boolean {
    const tempPath = `${this.filePath}.tmp`;

    try {
      const data: Record<string, Subscription> = Object.fromEntries(this.subscriptions);

      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      fs.writeFileSync(tempPath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
      fs.renameSync(tempPath, this.filePath);

      logger.debug(`Saved ${this.subscriptions.size} subscriptions`);
      return true;
    } catch (error) {
      logger.error(`Error saving subscriptions to ${this.filePath}:`, error);
      if (fs.existsSync(tempPath)) {
        fs.rmSync(tempPath, { force: true });
      }
      return false;
    }
  }

  get(userId: string): Subscription | undefined {
    return this.subscriptions.get(userId);
  }

  /**
   * Insert or replace a subscription and persist. Throws a ZodError for an
   * invalid subscription, leaving the map untouched.
   */
  addOrUpdate(userId: string, subscription: SubscriptionInput): Subscription {
    const validated = subscriptionSchema.parse(subscription);
    this.subscriptions.set(userId, validated);
    this.save();
    return validated;
  }

  remove(userId: string): boolean {
    if (!this.subscriptions.delete(userId)) {
      return false;
    }
    this.save();
    return true;
  }

  count(): number {
    return this.subscriptions.size;
  }

  /**
   * Snapshot of all subscriptions in insertion order.
   */
  all(): Array<[string, Subscription]> {
    return [...this.subscriptions.entries()];
  }
}
