export const SCHEDULE_TYPES = ['daily', 'weekly'] as const;

export type ScheduleType = typeof SCHEDULE_TYPES[number];

// 24-hour HH:MM
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)$/;

// ISO weekday (Monday = 1 ... Sunday = 7) on which weekly subscriptions fire
export const WEEKLY_DELIVERY_DAY = 7;

export const DEFAULT_SUBSCRIPTION_TIME = '09:30';

// Banks listed per currency in a notification message
export const MAX_BANKS_PER_MESSAGE = 15;

// Pause between broadcast messages to stay under messaging rate limits
export const BROADCAST_PAUSE_MS = 100;
