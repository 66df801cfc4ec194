import type { ScheduleType } from '../lib/constants.js';

// API Response Types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: {
    code: string;
    message: string;
    details?: unknown;
  };
  meta?: {
    total?: number;
    [key: string]: unknown;
  };
}

export interface UpsertSubscriptionRequest {
  currencies?: string[];
  schedule?: ScheduleType;
  time?: string;
}

export interface BroadcastRequest {
  message: string;
}

export interface SubscriptionStats {
  totalSubscriptions: number;
  currencies: Array<{ currency: string; subscribers: number }>;
}
