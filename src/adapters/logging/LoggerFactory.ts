/**
 * Logger Factory
 *
 * - LOGGER_TYPE=json → StructuredLogger
 * - LOGGER_TYPE=console (default) → ConsoleLogger
 */

import { ILogger, ILoggerFactory } from '@/interfaces/ILogger';
import { env } from '@/config/env';
import { ConsoleLogger } from './ConsoleLogger';
import { StructuredLogger } from './StructuredLogger';

export class LoggerFactory implements ILoggerFactory {
  constructor(private readonly loggerType: string = env.LOGGER_TYPE) {}

  createLogger(context?: string): ILogger {
    switch (this.loggerType.toLowerCase()) {
      case 'json':
        return new StructuredLogger(context);

      case 'console':
      default:
        return new ConsoleLogger(context);
    }
  }
}

/**
 * Default logger instance for application use
 */
const factory = new LoggerFactory();
export const logger = factory.createLogger('app');

/**
 * Create named loggers for specific contexts
 */
export function createLogger(context: string): ILogger {
  return factory.createLogger(context);
}
