/**
 * Rate Limiting Middleware
 *
 * express-rate-limit with the default in-memory store (per process).
 * - Global: every route except /health
 * - Writes: account creation, on top of the global limit
 *
 * Both return 429 with the standard error body and log the client at warn.
 */

import rateLimit, { Options } from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { RATE_LIMITS } from '@/config/limits';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';

/**
 * Client IP for rate limiting
 *
 * 'trust proxy' is enabled in app.ts, so req.ip already resolves
 * X-Forwarded-For. The socket address is the fallback for direct connections.
 */
function getClientIp(req: Request): string {
  return req.ip || req.socket.remoteAddress || 'unknown';
}

function limitExceeded(limiterName: string) {
  return (req: Request, res: Response, _next: NextFunction, options: Options): void => {
    logger.warn(
      {
        type: 'RATE_LIMIT_EXCEEDED',
        limiter: limiterName,
        ip: getClientIp(req),
        limit: options.limit,
      },
      'Rate limit exceeded'
    );
    res.status(options.statusCode).json(options.message);
  };
}

/**
 * Global rate limiter for all endpoints
 */
export const globalRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.GLOBAL.WINDOW_MS,
  limit: RATE_LIMITS.GLOBAL.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many requests. Please try again later. Limit: ${RATE_LIMITS.GLOBAL.MAX_REQUESTS} requests per window.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  skip: (req) => !env.RATE_LIMIT_ENABLED || req.path === '/health',
  handler: limitExceeded('global'),
  validate: { trustProxy: false },
});

/**
 * Stricter limiter for account creation
 */
export const accountWriteRateLimiter = rateLimit({
  windowMs: RATE_LIMITS.WRITES.WINDOW_MS,
  limit: RATE_LIMITS.WRITES.MAX_REQUESTS,
  message: {
    success: false,
    error: {
      message: `Too many account creation requests. Please slow down. Limit: ${RATE_LIMITS.WRITES.MAX_REQUESTS} per window.`,
    },
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIp(req),
  skip: () => !env.RATE_LIMIT_ENABLED,
  handler: limitExceeded('writes'),
  validate: { trustProxy: false },
});
