/**
 * Structured Logger Adapter
 *
 * JSON only, for deployments where a log shipper collects stdout. Every line
 * carries the service name and environment.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

export const SERVICE_NAME = 'account-service';

export function structuredLoggerOptions(name: string): pino.LoggerOptions {
  return {
    name,
    level: env.LOG_LEVEL,
    formatters: {
      level: (label) => {
        return { level: label.toUpperCase() };
      },
    },
    base: {
      env: env.NODE_ENV,
      service: SERVICE_NAME,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

export class StructuredLogger extends PinoLogger {
  constructor(context?: string) {
    super(pino(structuredLoggerOptions(context || 'app')));
  }
}
