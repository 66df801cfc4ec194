import { Router } from 'express';
import { AdminController } from '../controllers/adminController.js';
import { RateController } from '../controllers/rateController.js';
import { SubscriptionController } from '../controllers/subscriptionController.js';
import type { JobScheduler } from '../jobs/scheduler.js';
import type { AdminService } from '../services/adminService.js';
import type { ExchangeRateService } from '../services/exchangeRateService.js';
import type { RateExportService } from '../services/rateExportService.js';
import type { SubscriptionStore } from '../stores/subscriptionStore.js';
import { createAdminRoutes } from './adminRoutes.js';
import { createRateRoutes } from './rateRoutes.js';
import { createSubscriptionRoutes } from './subscriptionRoutes.js';

export interface ApiDependencies {
  rates: ExchangeRateService;
  exporter: RateExportService;
  store: SubscriptionStore;
  adminService: AdminService;
  jobs: JobScheduler;
  supportedCurrencies: readonly string[];
  adminToken?: string;
}

export function createApiRouter(deps: ApiDependencies): Router {
  const router = Router();

  // Mount routes
  router.use('/rates', createRateRoutes(new RateController(deps.rates, deps.exporter)));
  router.use(
    '/subscriptions',
    createSubscriptionRoutes(new SubscriptionController(deps.store, deps.supportedCurrencies))
  );
  router.use(
    '/admin',
    createAdminRoutes(new AdminController(deps.adminService, deps.jobs), deps.adminToken)
  );

  return router;
}
