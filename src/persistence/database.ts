import { Pool, type PoolClient } from 'pg';
import { loadConfig } from '../config/env';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

/**
 * Get or create the PostgreSQL connection pool
 */
export function getPool(): Pool {
  if (!pool) {
    const config = loadConfig();

    pool = new Pool({
      host: config.POSTGRES_HOST,
      port: config.POSTGRES_PORT,
      user: config.POSTGRES_USER,
      password: config.POSTGRES_PASSWORD,
      database: config.POSTGRES_DATABASE,
      max: config.POSTGRES_MAX_CONNECTIONS,
      connectionTimeoutMillis: 5000,
      idleTimeoutMillis: 30000
    });

    pool.on('error', (err) => {
      logger.error({ error: err.message }, 'PostgreSQL pool error');
    });
  }

  return pool;
}

/**
 * Close the PostgreSQL pool
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

/**
 * Test PostgreSQL connection
 */
export async function testConnection(): Promise<boolean> {
  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'PostgreSQL connection test failed');
    return false;
  }
}

/**
 * Runs work inside BEGIN/COMMIT on a dedicated client, rolling back on any error
 */
export async function withTransaction<T>(
  db: Pool,
  work: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await db.connect();

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error(
        { error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError) },
        'Rollback failed'
      );
    }
    throw error;
  } finally {
    client.release();
  }
}
