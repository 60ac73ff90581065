/**
 * PostgreSQL database connection pool
 * Shared by the source repository and the pgvector index
 */

import pg from 'pg';
import dotenv from 'dotenv';
import pino from 'pino';

// Load environment variables
dotenv.config();

const { Pool } = pg;

const logger = pino({
  name: 'db-connection',
  level: process.env.LOG_LEVEL || 'info',
});

/**
 * Database configuration from environment variables
 */
const dbConfig: pg.PoolConfig = {
  // Support both individual config vars and DATABASE_URL
  host: process.env.DB_HOST || 'localhost',
  port: parseInt(process.env.DB_PORT || '5432', 10),
  database: process.env.DB_NAME || 'transcripts',
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD,
  connectionString: process.env.DATABASE_URL,

  // SSL configuration for hosted databases
  ssl: process.env.DATABASE_URL && process.env.DB_SSL !== 'false'
    ? { rejectUnauthorized: false }
    : undefined,

  max: parseInt(process.env.DB_POOL_MAX || '20', 10),
  idleTimeoutMillis: 30000,
  connectionTimeoutMillis: 2000,
};

/**
 * PostgreSQL connection pool instance
 */
export const pool = new Pool(dbConfig);

/**
 * Errors on idle clients are network failures or database restarts
 */
pool.on('error', (err: Error) => {
  logger.fatal({ err }, 'Unexpected error on idle database client');
  process.exit(-1);
});

/**
 * Test database connection
 */
export async function testConnection(): Promise<boolean> {
  let client: pg.PoolClient | undefined;
  try {
    client = await pool.connect();
    const result = await client.query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ at: result.rows[0]?.now }, 'Database connected');
    return true;
  } catch (error) {
    logger.error({ err: error }, 'Database connection failed');
    return false;
  } finally {
    client?.release();
  }
}

/**
 * Gracefully close the database pool
 */
export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}

export type { Pool, PoolClient, QueryResult } from 'pg';
