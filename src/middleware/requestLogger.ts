import { NextFunction, Request, Response } from 'express';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('HTTP');

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();

  res.on('finish', () => {
    logger.info(`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms`);
  });

  next();
}
