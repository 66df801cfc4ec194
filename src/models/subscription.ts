import { z } from 'zod';
import { DEFAULT_SUBSCRIPTION_TIME, SCHEDULE_TYPES, TIME_OF_DAY_PATTERN } from '../lib/constants.js';

const currencyCode = z
  .string()
  .trim()
  .min(1, 'Currency code is required')
  .transform(code => code.toLowerCase());

// Keeps the first occurrence of each code, in order
export const currencyListSchema = z
  .array(currencyCode)
  .transform(codes => [...new Set(codes)]);

export const timeOfDaySchema = z
  .string()
  .regex(TIME_OF_DAY_PATTERN, 'Invalid time format (HH:MM)');

/**
 * Shape of one subscriber entry in the subscriptions file.
 */
export const subscriptionSchema = z.object({
  currencies: currencyListSchema.default([]),
  schedule: z.enum(SCHEDULE_TYPES).default('daily'),
  time: timeOfDaySchema.default(DEFAULT_SUBSCRIPTION_TIME),
});

export type Subscription = Readonly<z.infer<typeof subscriptionSchema>>;

export type SubscriptionInput = z.input<typeof subscriptionSchema>;

export const subscriptionsFileSchema = z.record(z.string(), z.unknown());

export function createSubscription(input: SubscriptionInput = {}): Subscription {
  return subscriptionSchema.parse(input);
}
