import { Router } from 'express';
import { z } from 'zod';
import { AdminController } from '../controllers/adminController.js';
import { adminAuth } from '../middleware/adminAuth.js';
import { validateRequest } from '../middleware/validation.js';

const broadcastSchema = z.object({
  message: z.string().trim().min(1, 'Message is required').max(4096),
});

export function createAdminRoutes(controller: AdminController, adminToken: string | undefined): Router {
  const router = Router();

  router.use(adminAuth(adminToken));

  router.get('/stats', controller.getStats);
  router.post('/broadcast', validateRequest(broadcastSchema), controller.broadcast);
  router.get('/scheduler', controller.getSchedulerStatus);
  router.post('/jobs/:name/run', controller.runJob);

  return router;
}
