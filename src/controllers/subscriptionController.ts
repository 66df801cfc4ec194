import { NextFunction, Request, Response } from 'express';
import { DEFAULT_SUBSCRIPTION_TIME } from '../lib/constants.js';
import { createError } from '../middleware/errorHandler.js';
import type { SubscriptionStore } from '../stores/subscriptionStore.js';
import type { UpsertSubscriptionRequest } from '../types/api.js';
import { toSingleString } from '../utils/express-utils.js';
import { successResponse } from '../utils/response.js';

function requireUserId(req: Request): string {
  const userId = toSingleString(req.params.userId)?.trim();
  if (!userId) {
    throw createError('User ID is required', 400, 'MISSING_ID');
  }
  return userId;
}

export class SubscriptionController {
  constructor(
    private readonly store: SubscriptionStore,
    private readonly supportedCurrencies: readonly string[]
  ) {}

  // GET /api/subscriptions/:userId - Get a user's subscription
  getSubscription = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const userId = requireUserId(req);
      const subscription = this.store.get(userId);

      if (!subscription) {
        throw createError('Subscription not found', 404, 'SUBSCRIPTION_NOT_FOUND');
      }

      successResponse(res, { userId, ...subscription });
    } catch (error) {
      next(error);
    }
  };

  // PUT /api/subscriptions/:userId - Create a subscription or change its settings
  upsertSubscription = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const userId = requireUserId(req);
      const update = req.body as UpsertSubscriptionRequest;
      const existing = this.store.get(userId);

      const currencies = update.currencies ?? existing?.currencies ?? [];
      if (currencies.length === 0) {
        throw createError('Select at least one currency', 400, 'NO_CURRENCIES');
      }

      const unsupported = currencies.filter(currency => !this.supportedCurrencies.includes(currency));
      if (unsupported.length > 0) {
        throw createError(
          `Currency ${unsupported.map(c => c.toUpperCase()).join(', ')} is not supported`,
          400,
          'UNSUPPORTED_CURRENCY'
        );
      }

      const saved = this.store.addOrUpdate(userId, {
        currencies,
        schedule: update.schedule ?? existing?.schedule ?? 'daily',
        time: update.time ?? existing?.time ?? DEFAULT_SUBSCRIPTION_TIME,
      });

      successResponse(res, { userId, ...saved }, existing ? 200 : 201);
    } catch (error) {
      next(error);
    }
  };

  // DELETE /api/subscriptions/:userId - Unsubscribe
  deleteSubscription = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const userId = requireUserId(req);

      if (!this.store.remove(userId)) {
        throw createError('Subscription not found', 404, 'SUBSCRIPTION_NOT_FOUND');
      }

      successResponse(res, { message: 'Unsubscribed' });
    } catch (error) {
      next(error);
    }
  };
}
