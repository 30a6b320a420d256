import pino from 'pino';
import { env } from '@/config/env';
import { consoleLoggerOptions } from '@/adapters/logging/ConsoleLogger';
import { structuredLoggerOptions } from '@/adapters/logging/StructuredLogger';

/**
 * Raw pino instance for the HTTP access log
 * Same output format as the ILogger adapters picked by LOGGER_TYPE.
 */
export const logger = pino(
  env.LOGGER_TYPE === 'json' ? structuredLoggerOptions('http') : consoleLoggerOptions('http')
);
