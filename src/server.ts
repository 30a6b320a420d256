import { Server } from 'http';
import app from './app';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { testConnection, ensureSchema, closePool } from '@/config/database';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

const FORCED_SHUTDOWN_MS = 10_000;

let server: Server | undefined;

async function startServer(): Promise<void> {
  logger.info('Testing database connection...');
  const dbConnected = await testConnection();

  if (!dbConnected) {
    logger.fatal('Failed to connect to database. Exiting...');
    process.exit(1);
  }

  await ensureSchema();

  server = app.listen(env.PORT, () => {
    logger.info(
      {
        port: env.PORT,
        env: env.NODE_ENV,
      },
      `Account service listening on http://localhost:${env.PORT}`
    );
    logger.info(`Health check: http://localhost:${env.PORT}/health`);
  });

  server.on('error', (error: NodeJS.ErrnoException) => {
    if (error.code === 'EADDRINUSE') {
      logger.fatal(`Port ${env.PORT} is already in use`);
    } else {
      logger.fatal({ error }, 'Server error');
    }
    process.exit(1);
  });
}

async function closeDatabase(): Promise<void> {
  try {
    await closePool();
  } catch (error) {
    logger.error({ error }, 'Error closing database connections');
  }
}

/**
 * Stop accepting connections, let in-flight requests finish, then close the
 * pool. Exits with 1 if that takes longer than FORCED_SHUTDOWN_MS.
 */
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  if (!server) {
    process.exit(0);
  }

  server.close(() => {
    logger.info('HTTP server closed');
    closeDatabase().then(
      () => {
        logger.info('Graceful shutdown complete');
        process.exit(0);
      },
      () => process.exit(1)
    );
  });

  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, FORCED_SHUTDOWN_MS).unref();
}

process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.fatal({ error }, 'Uncaught Exception');
  process.exit(1);
});

startServer().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  process.exit(1);
});
