import { NextFunction, Request, Response } from 'express';
import type { JobScheduler } from '../jobs/scheduler.js';
import { createError } from '../middleware/errorHandler.js';
import type { AdminService } from '../services/adminService.js';
import type { BroadcastRequest } from '../types/api.js';
import { toSingleString } from '../utils/express-utils.js';
import { successResponse } from '../utils/response.js';

export class AdminController {
  constructor(
    private readonly adminService: AdminService,
    private readonly jobs: JobScheduler
  ) {}

  // GET /api/admin/stats - Subscriber statistics
  getStats = (_req: Request, res: Response): void => {
    successResponse(res, this.adminService.getStats());
  };

  // POST /api/admin/broadcast - Message every subscriber
  broadcast = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { message } = req.body as BroadcastRequest;
      const result = await this.adminService.broadcast(message);
      successResponse(res, result);
    } catch (error) {
      next(error);
    }
  };

  // GET /api/admin/scheduler - Background job status
  getSchedulerStatus = (_req: Request, res: Response): void => {
    successResponse(res, this.jobs.getStatus());
  };

  // POST /api/admin/jobs/:name/run - Run a job immediately
  runJob = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const name = toSingleString(req.params.name) ?? '';
      const result = await this.jobs.runJob(name);

      if (!result.success) {
        throw createError(result.error ?? 'Job failed', 404, 'UNKNOWN_JOB');
      }

      successResponse(res, result.result);
    } catch (error) {
      next(error);
    }
  };
}
