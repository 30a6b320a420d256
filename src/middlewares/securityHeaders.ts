import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';

/**
 * Security headers for requests that arrived over HTTPS
 *
 * With 'trust proxy' enabled, req.secure also honours X-Forwarded-Proto from
 * a TLS-terminating proxy. Plain HTTP responses are left untouched.
 *
 * Only the four headers below are configured; helmet's other defaults (HSTS,
 * COOP, CORP, Origin-Agent-Cluster and friends) stay on for HTTPS responses.
 */
const secureResponseHeaders = helmet({
  contentSecurityPolicy: {
    useDefaults: false,
    directives: {
      defaultSrc: ["'self'"],
      objectSrc: ["'none'"],
    },
  },
  xFrameOptions: { action: 'sameorigin' },
  xContentTypeOptions: true,
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

export function securityHeaders(req: Request, res: Response, next: NextFunction): void {
  if (!req.secure) {
    next();
    return;
  }

  secureResponseHeaders(req, res, next);
}
