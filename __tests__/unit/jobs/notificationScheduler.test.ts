import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { formatExchangeRates } from '../../../src/config/notificationMessages.js';
import { isDue, NotificationScheduler } from '../../../src/jobs/notificationScheduler.js';
import { createSubscription } from '../../../src/models/subscription.js';
import type { DeliveryResult, NotificationDelivery } from '../../../src/services/telegramDeliveryService.js';
import { SubscriptionStore } from '../../../src/stores/subscriptionStore.js';
import type { ExchangeRateRecord, RateSource } from '../../../src/types/rates.js';

// 2024-01-07 was a Sunday, 2024-01-08 a Monday
const SUNDAY_0930 = new Date('2024-01-07T09:30:00.000Z');
const MONDAY_0930 = new Date('2024-01-08T09:30:00.000Z');

const RECORDS: Record<string, ExchangeRateRecord[]> = {
  usd: [{ bank: 'BankA', currency: 'USD', cashBuy: '41.10', cashSell: '41.60', updateTime: '09:00' }],
  eur: [{ bank: 'BankB', currency: 'EUR', cashBuy: '44.90', cashSell: '45.40', updateTime: '09:05' }],
};

function createRates() {
  return {
    getExchangeRates: vi.fn(async (currency: string): Promise<ExchangeRateRecord[]> => RECORDS[currency] ?? []),
  } satisfies RateSource;
}

function createDelivery() {
  return {
    send: vi.fn(async (_recipientId: string, _text: string): Promise<DeliveryResult> => ({ success: true, messageId: '1' })),
  } satisfies NotificationDelivery;
}

describe('isDue', () => {
  const mondayClock = { time: '09:30', weekday: 1 };
  const sundayClock = { time: '09:30', weekday: 7 };

  it('fires a daily subscription on any day at its exact time', () => {
    const subscription = createSubscription({ schedule: 'daily', time: '09:30' });
    expect(isDue(subscription, mondayClock)).toBe(true);
    expect(isDue(subscription, sundayClock)).toBe(true);
  });

  it('fires a weekly subscription only on Sunday', () => {
    const subscription = createSubscription({ schedule: 'weekly', time: '09:30' });
    expect(isDue(subscription, mondayClock)).toBe(false);
    expect(isDue(subscription, sundayClock)).toBe(true);
  });

  it('does not fire outside the exact minute', () => {
    const subscription = createSubscription({ schedule: 'daily', time: '09:30' });
    expect(isDue(subscription, { time: '09:31', weekday: 1 })).toBe(false);
    expect(isDue(subscription, { time: '09:29', weekday: 1 })).toBe(false);
  });
});

describe('NotificationScheduler', () => {
  let dir: string;
  let store: SubscriptionStore;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scheduler-'));
    store = new SubscriptionStore(path.join(dir, 'subscriptions.json'));
    store.addOrUpdate('1', { currencies: ['usd', 'eur'], schedule: 'daily', time: '09:30' });
    store.addOrUpdate('2', { currencies: ['usd'], schedule: 'weekly', time: '09:30' });
    store.addOrUpdate('3', { currencies: ['eur'], schedule: 'daily', time: '10:00' });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('notifies due daily subscribers once per currency in subscription order', async () => {
    const rates = createRates();
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(store, rates, delivery, { timezone: 'UTC' });

    const summary = await scheduler.runTick(MONDAY_0930);

    expect(summary).toMatchObject({ dueSubscriptions: 1, sent: 2, failed: 0 });
    expect(summary.clock).toEqual({ time: '09:30', weekday: 1 });
    expect(delivery.send.mock.calls).toEqual([
      ['1', formatExchangeRates(RECORDS.usd ?? [], 'usd', MONDAY_0930, 'UTC')],
      ['1', formatExchangeRates(RECORDS.eur ?? [], 'eur', MONDAY_0930, 'UTC')],
    ]);
  });

  it('includes weekly subscribers on Sunday', async () => {
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(store, createRates(), delivery, { timezone: 'UTC' });

    const summary = await scheduler.runTick(SUNDAY_0930);

    expect(summary).toMatchObject({ dueSubscriptions: 2, sent: 3, failed: 0 });
    expect(delivery.send.mock.calls.map(([userId]) => userId)).toEqual(['1', '1', '2']);
  });

  it('compares times in the configured time zone', async () => {
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(store, createRates(), delivery, { timezone: 'Europe/Berlin' });

    // 08:30 UTC is 09:30 in Berlin in January
    const summary = await scheduler.runTick(new Date('2024-01-08T08:30:00.000Z'));

    expect(summary.clock.time).toBe('09:30');
    expect(summary.dueSubscriptions).toBe(1);
  });

  it('sends the no-data message when a currency has no rates', async () => {
    store.addOrUpdate('1', { currencies: ['pln'], schedule: 'daily', time: '09:30' });
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(store, createRates(), delivery, { timezone: 'UTC' });

    await scheduler.runTick(MONDAY_0930);

    expect(delivery.send).toHaveBeenCalledWith('1', 'No exchange rate data available for PLN');
  });

  it('isolates a failed fetch to its own user and currency', async () => {
    const rates = createRates();
    rates.getExchangeRates.mockImplementation(async (currency: string) => {
      if (currency === 'usd') {
        throw new Error('rates unavailable');
      }
      return RECORDS[currency] ?? [];
    });
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(store, rates, delivery, { timezone: 'UTC' });

    const summary = await scheduler.runTick(MONDAY_0930);

    expect(summary).toMatchObject({ sent: 1, failed: 1 });
    expect(delivery.send).toHaveBeenCalledTimes(1);
    expect(delivery.send.mock.calls[0]?.[0]).toBe('1');
  });

  it('keeps delivering to other users after a delivery failure', async () => {
    const delivery = createDelivery();
    delivery.send
      .mockResolvedValueOnce({ success: false, error: 'Forbidden: bot was blocked by the user' })
      .mockRejectedValueOnce(new Error('socket hang up'));
    const scheduler = new NotificationScheduler(store, createRates(), delivery, { timezone: 'UTC' });

    const summary = await scheduler.runTick(SUNDAY_0930);

    expect(summary).toMatchObject({ dueSubscriptions: 2, sent: 1, failed: 2 });
    expect(delivery.send).toHaveBeenCalledTimes(3);
  });

  it('runs a tick on start and saves subscriptions when stopped', async () => {
    const filePath = path.join(dir, 'subscriptions.json');
    fs.rmSync(filePath);
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(store, createRates(), delivery, {
      timezone: 'UTC',
      intervalMs: 60_000,
      now: () => MONDAY_0930,
    });

    scheduler.start();
    expect(scheduler.isRunning()).toBe(true);
    await vi.waitFor(() => expect(delivery.send).toHaveBeenCalledTimes(2));
    await scheduler.stop();

    expect(scheduler.isRunning()).toBe(false);
    expect(scheduler.getStatus().state).toBe('stopped');
    expect(fs.existsSync(filePath)).toBe(true);
  });

  it('stops a tick in progress when stop() is called', async () => {
    const busyStore = new SubscriptionStore(path.join(dir, 'busy.json'));
    for (const userId of ['1', '2', '3', '4', '5']) {
      busyStore.addOrUpdate(userId, { currencies: ['usd', 'eur'], schedule: 'daily', time: '09:30' });
    }
    fs.rmSync(path.join(dir, 'busy.json'));

    const rates = createRates();
    rates.getExchangeRates.mockImplementation(async (currency: string) => {
      await new Promise(resolve => setTimeout(resolve, 50));
      return RECORDS[currency] ?? [];
    });
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(busyStore, rates, delivery, {
      timezone: 'UTC',
      intervalMs: 60_000,
      now: () => MONDAY_0930,
    });

    let stopping: Promise<void> | null = null;
    delivery.send.mockImplementation(async (): Promise<DeliveryResult> => {
      stopping ??= scheduler.stop();
      return { success: true, messageId: '1' };
    });

    scheduler.start();
    await vi.waitFor(() => expect(delivery.send).toHaveBeenCalled());
    await stopping;

    expect(delivery.send.mock.calls.map(([userId]) => userId)).toEqual(['1']);
    expect(rates.getExchangeRates).toHaveBeenCalledTimes(2);
    expect(scheduler.getStatus().lastTick).toMatchObject({ dueSubscriptions: 5, sent: 1, cancelled: true });
    expect(fs.existsSync(path.join(dir, 'busy.json'))).toBe(true);
  });

  it('keeps looping after an unexpected error in a tick', async () => {
    const delivery = createDelivery();
    const scheduler = new NotificationScheduler(store, createRates(), delivery, {
      timezone: 'UTC',
      intervalMs: 5,
      now: () => MONDAY_0930,
    });
    vi.spyOn(store, 'all').mockImplementationOnce(() => {
      throw new Error('corrupted state');
    });

    scheduler.start();
    await vi.waitFor(() => expect(delivery.send).toHaveBeenCalled());
    await scheduler.stop();

    expect(scheduler.getStatus().lastTick?.dueSubscriptions).toBe(1);
  });

  it('ignores a second start while running', async () => {
    const scheduler = new NotificationScheduler(store, createRates(), createDelivery(), {
      timezone: 'UTC',
      intervalMs: 60_000,
      now: () => MONDAY_0930,
    });

    scheduler.start();
    scheduler.start();
    await scheduler.stop();

    expect(scheduler.isRunning()).toBe(false);
  });
});
