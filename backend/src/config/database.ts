import { Pool } from 'pg';
import type { PoolClient, PoolConfig } from 'pg';
import { logger } from './logger.js';
import { createError } from '../utils/errors.js';

type Env = Record<string, string | undefined>;

const toInt = (env: Env, key: string, fallback: string): number => {
  const raw = env[key] || fallback;
  const value = parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw createError(`${key} must be an integer, got "${raw}"`, 'INVALID_CONFIG');
  }
  return value;
};

// PostgreSQL connection configuration
export const loadDatabaseConfig = (env: Env = process.env): PoolConfig => ({
  user: env.DB_USER || 'postgres',
  password: env.DB_PASSWORD || 'postgres',
  host: env.DB_HOST || 'localhost',
  port: toInt(env, 'DB_PORT', '5432'),
  database: env.DB_NAME || 'lexicon',
  ssl: env.DB_SSL === 'true' ? { rejectUnauthorized: false } : false,
  // Connection pool settings
  max: toInt(env, 'DB_POOL_MAX', '20'),
  min: toInt(env, 'DB_POOL_MIN', '2'),
  idleTimeoutMillis: toInt(env, 'DB_IDLE_TIMEOUT', '30000'),
  connectionTimeoutMillis: toInt(env, 'DB_CONNECTION_TIMEOUT', '2000'),
});

export const createPool = (config: PoolConfig = loadDatabaseConfig()): Pool => {
  const pool = new Pool(config);

  pool.on('connect', () => {
    logger.debug('New database client connected');
  });

  pool.on('error', (err) => {
    logger.error('Database pool error:', err);
  });

  pool.on('remove', () => {
    logger.debug('Database client removed from pool');
  });

  return pool;
};

// Database connection health check
export const checkDatabaseConnection = async (pool: Pool): Promise<boolean> => {
  try {
    const client = await pool.connect();
    try {
      await client.query('SELECT NOW()');
    } finally {
      client.release();
    }
    logger.info('Database connection successful');
    return true;
  } catch (error) {
    logger.error('Database connection failed:', error);
    return false;
  }
};

// Graceful shutdown
export const closeDatabaseConnection = async (pool: Pool): Promise<void> => {
  await pool.end();
  logger.info('Database pool closed');
};

/**
 * BEGIN/COMMIT 으로 감싼 트랜잭션을 실행합니다. 실패 시 ROLLBACK 후 에러를 그대로 전파합니다.
 */
export const withTransaction = async <T>(
  pool: Pool,
  work: (client: PoolClient) => Promise<T>
): Promise<T> => {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      logger.error('Transaction rollback failed:', rollbackError);
    }
    throw error;
  } finally {
    client.release();
  }
};
