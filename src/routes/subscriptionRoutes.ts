import { Router } from 'express';
import { z } from 'zod';
import { SubscriptionController } from '../controllers/subscriptionController.js';
import { SCHEDULE_TYPES } from '../lib/constants.js';
import { validateRequest } from '../middleware/validation.js';
import { currencyListSchema, timeOfDaySchema } from '../models/subscription.js';

// Validation schemas
const upsertSubscriptionSchema = z.object({
  currencies: currencyListSchema.optional(),
  schedule: z.enum(SCHEDULE_TYPES).optional(),
  time: timeOfDaySchema.optional(),
});

export function createSubscriptionRoutes(controller: SubscriptionController): Router {
  const router = Router();

  router.get('/:userId', controller.getSubscription);
  router.put('/:userId', validateRequest(upsertSubscriptionSchema), controller.upsertSubscription);
  router.delete('/:userId', controller.deleteSubscription);

  return router;
}
