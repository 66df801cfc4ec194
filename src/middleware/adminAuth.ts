import { timingSafeEqual } from 'node:crypto';
import { NextFunction, Request, Response } from 'express';

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Bearer-token guard for the admin routes. With no token configured the
 * admin routes are disabled entirely.
 */
export function adminAuth(adminToken: string | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!adminToken) {
      res.status(403).json({
        success: false,
        error: {
          code: 'ADMIN_DISABLED',
          message: 'Admin API is not configured',
        },
      });
      return;
    }

    const header = req.headers.authorization ?? '';
    const provided = header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';

    if (!provided || !tokensMatch(adminToken, provided)) {
      res.status(401).json({
        success: false,
        error: {
          code: 'UNAUTHORIZED',
          message: 'Admin token required',
        },
      });
      return;
    }

    next();
  };
}
