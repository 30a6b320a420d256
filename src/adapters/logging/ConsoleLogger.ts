/**
 * Console Logger Adapter
 *
 * Pretty-printed in development (LOG_PRETTY), plain JSON lines everywhere else.
 */

import pino from 'pino';
import { env } from '@/config/env';
import { PinoLogger } from './PinoLogger';

export function consoleLoggerOptions(name: string): pino.LoggerOptions {
  return {
    name,
    level: env.LOG_LEVEL,
    transport:
      env.isDevelopment && env.LOG_PRETTY
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  };
}

export class ConsoleLogger extends PinoLogger {
  constructor(context?: string) {
    super(pino(consoleLoggerOptions(context || 'app')));
  }
}
