import { readFileSync } from 'fs';
import { join } from 'path';
import { Pool, QueryResult, QueryResultRow } from 'pg';
import { env } from '@/config/env';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';
import { DB_QUERY_LIMITS } from '@/config/limits';

const logger = createLogger('database');

/**
 * PostgreSQL connection pool
 * The connection string alone selects the store (DATABASE_URI)
 */
const pool = new Pool({
  connectionString: env.DATABASE_URI,
  ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
  statement_timeout: DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS,
  max: DATABASE_POOL_CONFIG.max,
  idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
  connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
  maxUses: DATABASE_POOL_CONFIG.maxUses,
});

// Let the pool recycle broken idle clients; don't crash the process
pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
});

/**
 * Execute a SQL query with parameters
 * Each call runs in its own implicit transaction (autocommit)
 * @param text - SQL query string
 * @param params - Query parameters
 */
export async function query<T extends QueryResultRow>(
  text: string,
  params: unknown[] = []
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = await pool.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration >= DB_QUERY_LIMITS.SLOW_QUERY_THRESHOLD_MS) {
      logger.warn({ query: text, duration, rows: result.rowCount }, 'Slow SQL query');
    } else {
      logger.debug({ query: text, duration, rows: result.rowCount }, 'Executed SQL query');
    }

    return result;
  } catch (error) {
    logger.error(
      {
        error,
        query: text,
        paramCount: params.length,
      },
      'Database query error'
    );
    throw error;
  }
}

/**
 * Create the accounts table if it does not exist yet
 * Reads db/schema.sql from the project root (same path from src/ and dist/)
 */
export async function ensureSchema(): Promise<void> {
  const schemaPath = join(__dirname, '../../db/schema.sql');
  await query(readFileSync(schemaPath, 'utf8'));
  logger.info({ schemaPath }, 'Database schema ensured');
}

/**
 * Test database connection
 * Used for startup validation
 */
export async function testConnection(): Promise<boolean> {
  try {
    const result = await query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ time: result.rows[0]?.now }, 'Database connection successful');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

/**
 * Close all connections in the pool
 * Should be called during graceful shutdown
 */
export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}
