import express, { Express, Request, Response } from 'express';
import helmet from 'helmet';
import { createCorsMiddleware } from './middleware/cors.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';
import { createApiRouter, type ApiDependencies } from './routes/index.js';

export interface AppOptions extends ApiDependencies {
  corsOrigin?: string;
  environment: string;
}

export function createApp(options: AppOptions): Express {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS middleware
  app.use(createCorsMiddleware(options.corsOrigin));

  // Body parsing middleware
  app.use(express.json({ limit: '100kb' }));

  // Request logging
  app.use(requestLogger);

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        status: 'OK',
        timestamp: new Date().toISOString(),
        version: process.env.npm_package_version ?? '1.0.0',
        environment: options.environment,
        subscriptions: options.store.count(),
        scheduler: options.jobs.getStatus().isRunning ? 'running' : 'stopped',
      },
    });
  });

  app.get('/api', (_req: Request, res: Response) => {
    res.json({
      success: true,
      data: {
        message: 'Bank rate notifier API is running',
        endpoints: {
          health: '/health',
          rates: '/api/rates/:currency',
          ratesExport: '/api/rates/:currency/export?format=csv|json',
          subscription: '/api/subscriptions/:userId',
          admin: {
            stats: '/api/admin/stats',
            broadcast: '/api/admin/broadcast',
            scheduler: '/api/admin/scheduler',
            runJob: '/api/admin/jobs/:name/run',
          },
        },
      },
    });
  });

  // Mount API routes after the info endpoint
  app.use('/api', createApiRouter(options));

  app.use(notFoundHandler);

  // Error handling middleware (should be last)
  app.use(errorHandler);

  return app;
}
