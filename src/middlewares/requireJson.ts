import { Request, Response, NextFunction } from 'express';
import { UnsupportedMediaTypeError } from '@/errors';

const JSON_CONTENT_TYPE = 'application/json';

/**
 * Reject bodies that are not declared as JSON (415)
 * Applied to create and update routes; a charset parameter is allowed
 */
export function requireJsonContentType(req: Request, _res: Response, next: NextFunction): void {
  if (!req.get('Content-Type')) {
    next(new UnsupportedMediaTypeError('Content-Type not set'));
    return;
  }

  if (!req.is(JSON_CONTENT_TYPE)) {
    next(new UnsupportedMediaTypeError(`Content-Type must be ${JSON_CONTENT_TYPE}`));
    return;
  }

  next();
}
