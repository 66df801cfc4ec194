import { Router } from 'express';
import { RateController } from '../controllers/rateController.js';

export function createRateRoutes(controller: RateController): Router {
  const router = Router();

  router.get('/:currency', controller.getRates);
  router.get('/:currency/export', controller.exportRates);

  return router;
}
