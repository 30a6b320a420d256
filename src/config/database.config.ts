/**
 * Database Connection Pool Configuration
 *
 * See: https://node-postgres.com/apis/pool
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Maximum number of connections in pool
   *
   * PostgreSQL allows 100 connections by default. 20 per instance leaves room
   * for a few replicas plus admin sessions.
   */
  max: env.DB_MAX_CONNECTIONS,

  /**
   * Idle connection timeout (5 minutes)
   *
   * Keeps connections warm across short traffic dips, releases them during
   * long quiet periods.
   */
  idleTimeoutMillis: 300_000,

  /**
   * Connection acquisition timeout (10 seconds)
   *
   * A request waits this long for a free connection before the query fails
   * and the caller gets a 500.
   */
  connectionTimeoutMillis: 10_000,

  /**
   * Recycle a connection after this many queries
   */
  maxUses: 7_500,
} as const;

export type DatabasePoolConfig = typeof DATABASE_POOL_CONFIG;
