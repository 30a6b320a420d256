import { Request, Response, NextFunction } from 'express';
import { AppError, FieldError, ValidationError } from '@/errors';
import { logger } from '@/adapters/logging/LoggerFactory';
import { env } from '@/config/env';

interface ErrorResponse {
  success: false;
  error: {
    message: string;
    details?: FieldError[];
  };
}

/**
 * Errors raised by express.json() before a route runs
 * (malformed JSON, body over the size limit)
 */
interface BodyParserError extends Error {
  status: number;
  type: string;
}

function isBodyParserError(err: Error): err is BodyParserError {
  return (
    'type' in err &&
    typeof err.type === 'string' &&
    'status' in err &&
    typeof err.status === 'number' &&
    err.status >= 400 &&
    err.status < 500
  );
}

/**
 * Personal data is not written to logs
 */
const SENSITIVE_FIELDS = new Set(['email', 'address', 'phone_number']);

function sanitizeRequestBody(body: unknown): unknown {
  if (Array.isArray(body)) {
    return body.map(sanitizeRequestBody);
  }

  if (!body || typeof body !== 'object') {
    return body;
  }

  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(body)) {
    sanitized[key] = SENSITIVE_FIELDS.has(key) ? '[REDACTED]' : sanitizeRequestBody(value);
  }
  return sanitized;
}

/**
 * In production, hide messages that reveal schema or file-system details
 */
function sanitizeErrorMessage(message: string): string {
  if (!env.isProduction) {
    return message;
  }

  const sensitivePatterns = [
    /database|postgres|sql|query/i,
    /file|path|directory/i,
    /column|table|constraint/i,
  ];

  if (sensitivePatterns.some((pattern) => pattern.test(message))) {
    return 'An error occurred while processing your request';
  }

  return message;
}

function resolveError(err: Error): { statusCode: number; message: string; details?: FieldError[] } {
  if (err instanceof AppError) {
    return {
      statusCode: err.statusCode,
      message: sanitizeErrorMessage(err.message),
      details: err instanceof ValidationError ? err.errors : undefined,
    };
  }

  if (isBodyParserError(err)) {
    return {
      statusCode: err.status,
      message:
        err.type === 'entity.parse.failed' ? 'Malformed JSON in request body' : err.message,
    };
  }

  // Server fault: no detail leaves the process
  return { statusCode: 500, message: 'Internal server error' };
}

/**
 * Global error handler middleware
 * Maps every error to a status code and a uniform JSON body
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const { statusCode, message, details } = resolveError(err);

  const logContext = {
    error: {
      name: err.name,
      message: err.message,
      stack: statusCode >= 500 ? err.stack : undefined,
    },
    request: {
      method: req.method,
      url: req.url,
      body: sanitizeRequestBody(req.body),
    },
    statusCode,
  };

  if (statusCode >= 500) {
    logger.error(logContext, 'Request failed');
  } else {
    logger.warn(logContext, 'Request rejected');
  }

  const body: ErrorResponse = {
    success: false,
    error: { message },
  };

  if (details && details.length > 0) {
    body.error.details = details;
  }

  res.status(statusCode).json(body);
}
