import express, { Application } from 'express';
import cors from 'cors';
import swaggerUi from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { REQUEST_LIMITS } from '@/config/limits';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { securityHeaders } from '@/middlewares/securityHeaders';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// Trust proxy headers so req.secure and req.ip reflect the client behind a
// TLS-terminating proxy (X-Forwarded-Proto, X-Forwarded-For)
app.set('trust proxy', true);

// Security headers (HTTPS requests only)
app.use(securityHeaders);

// CORS - wildcard origin on every response, no credentials
app.use(
  cors({
    origin: env.CORS_ORIGIN,
    credentials: false,
  })
);

// Body parser with size limit; only application/json bodies are parsed
app.use(express.json({ limit: REQUEST_LIMITS.JSON_BODY }));

// Global rate limiting (all routes except /health)
app.use(globalRateLimiter);

// Request logging (pino-http)
app.use(requestLogger);

// ============================================
// Routes
// ============================================

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// Swagger API Documentation
try {
  const openapiPath = join(__dirname, '../docs/openapi.yaml');
  const openapiDocument = yaml.load(readFileSync(openapiPath, 'utf8'));
  if (isJsonObject(openapiDocument)) {
    app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
  } else {
    logger.warn({ openapiPath }, 'OpenAPI document is not a mapping');
  }
} catch (error) {
  logger.warn({ error }, 'Could not load OpenAPI documentation');
}

// Root endpoint
app.get('/', (_req, res) => {
  res.json({
    name: 'Account REST API Service',
    version: '1.0',
    paths: '/accounts',
    documentation: '/api-docs',
  });
});

app.use('/', apiRoutes);

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
