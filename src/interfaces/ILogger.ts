/**
 * Logger Interface
 *
 * Application code logs through this interface. LoggerFactory picks the
 * adapter (pretty console or JSON for log shippers) from LOGGER_TYPE.
 */

/**
 * Structured fields attached to a log entry
 */
export type LogMetadata = Record<string, unknown>;

export interface ILogger {
  /**
   * Diagnostic detail, e.g. "Executed SQL query"
   */
  debug(message: string): void;
  debug(metadata: LogMetadata, message: string): void;

  /**
   * Normal operations and business events, e.g. "Account created"
   */
  info(message: string): void;
  info(metadata: LogMetadata, message: string): void;

  /**
   * Client mistakes and degraded operation, e.g. "Rate limit exceeded"
   */
  warn(message: string): void;
  warn(metadata: LogMetadata, message: string): void;

  /**
   * Failed operations, e.g. "Database query error"
   */
  error(message: string): void;
  error(metadata: LogMetadata, message: string): void;

  /**
   * Unrecoverable errors that stop the process
   */
  fatal(message: string): void;
  fatal(metadata: LogMetadata, message: string): void;
}

export interface ILoggerFactory {
  /**
   * @param context - Logger name, e.g. "AccountService"
   */
  createLogger(context?: string): ILogger;
}
