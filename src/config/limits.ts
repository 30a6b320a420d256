import { env } from './env';

/**
 * Service Limits
 *
 * Request, rate and query limits in one place so that middleware and the
 * database layer read the same numbers.
 */

/**
 * Request body limits
 * Account payloads are a handful of short strings.
 */
export const REQUEST_LIMITS = {
  JSON_BODY: '10kb',
} as const;

/**
 * Column limits of the accounts table (db/schema.sql)
 * Payloads are checked against these before anything reaches storage.
 */
export const ACCOUNT_LIMITS = {
  NAME_MAX_LENGTH: 64,
  EMAIL_MAX_LENGTH: 64,
  ADDRESS_MAX_LENGTH: 256,
  PHONE_NUMBER_MAX_LENGTH: 32,
  /** Largest value of a SERIAL (int4) id */
  MAX_ID: 2_147_483_647,
} as const;

/**
 * Rate Limiting Configuration
 * - GLOBAL applies to every route except /health
 * - WRITES applies on top of GLOBAL to account creation
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: env.RATE_LIMIT_WINDOW_MS,
    MAX_REQUESTS: env.RATE_LIMIT_MAX_REQUESTS,
  },
  WRITES: {
    WINDOW_MS: env.RATE_LIMIT_WINDOW_MS,
    MAX_REQUESTS: env.RATE_LIMIT_MAX_WRITES,
  },
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /**
   * Per-statement timeout (10 seconds)
   * Every account query is a single-row or full-table read/write on a small table.
   */
  STATEMENT_TIMEOUT_MS: 10_000,

  /**
   * Queries slower than this are logged at warn
   */
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;

export type RequestLimits = typeof REQUEST_LIMITS;
export type AccountLimits = typeof ACCOUNT_LIMITS;
export type RateLimits = typeof RATE_LIMITS;
export type DBQueryLimits = typeof DB_QUERY_LIMITS;
