import { Request, Response, NextFunction } from 'express';
import { NotFoundError } from '@/errors';

/**
 * Catch-all for unmatched routes (must be registered after all routes)
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(NotFoundError.route(req.method, req.path));
}
