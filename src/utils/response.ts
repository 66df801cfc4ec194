import { Response } from 'express';
import type { ApiResponse } from '../types/api.js';

export function successResponse<T>(res: Response, data: T, statusCode = 200, meta?: ApiResponse['meta']): void {
  const body: ApiResponse<T> = { success: true, data };
  if (meta) {
    body.meta = meta;
  }
  res.status(statusCode).json(body);
}
