import { NextFunction, Request, Response } from 'express';
import { z } from 'zod';

/**
 * Validate `req.body` against a zod schema and replace it with the parsed value
 */
export function validateRequest<T extends z.ZodTypeAny>(schema: T) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      res.status(400).json({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Invalid request data',
          details: result.error.issues,
        },
      });
      return;
    }

    req.body = result.data;
    next();
  };
}
