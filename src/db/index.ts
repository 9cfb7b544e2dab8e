/**
 * PostgreSQL Database Connection
 */

import { Pool, type QueryResultRow } from 'pg';
import { readFile } from 'fs/promises';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { config } from '../config/index.js';
import { ConfigurationError } from '../errors.js';
import { logger } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let pool: Pool | null = null;

/**
 * Get the database pool
 */
export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return pool;
}

/**
 * Initialize database connection pool and schema
 */
export async function initDatabase(): Promise<void> {
  if (pool) {
    logger.debug('Database pool already initialized');
    return;
  }

  if (!config.database.url) {
    throw new ConfigurationError('DATABASE_URL is not configured');
  }

  const created = new Pool({
    connectionString: config.database.url,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  created.on('error', (error) => {
    logger.error({ error: error.message }, 'Idle database client error');
  });

  // Test connection
  try {
    const client = await created.connect();
    logger.info('Database connection established');
    client.release();
  } catch (error) {
    logger.fatal({ error }, 'Failed to connect to database');
    await created.end();
    throw error;
  }

  pool = created;
  await initSchema(created);
}

/**
 * Initialize database schema (idempotent DDL)
 */
async function initSchema(target: Pool): Promise<void> {
  const schema = await readFile(join(__dirname, 'schema.sql'), 'utf-8');

  try {
    await target.query(schema);
    logger.info('Database schema initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize schema');
    throw error;
  }
}

/**
 * Execute a query and return rows
 */
export async function query<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T[]> {
  const result = await getPool().query<T>(text, params);
  return result.rows;
}

/**
 * Execute a query and return first row or null
 */
export async function queryOne<T extends QueryResultRow>(text: string, params?: unknown[]): Promise<T | null> {
  const result = await getPool().query<T>(text, params);
  return result.rows[0] ?? null;
}

/**
 * Execute a statement and return the affected row count
 */
export async function execute(text: string, params?: unknown[]): Promise<number> {
  const result = await getPool().query(text, params);
  return result.rowCount ?? 0;
}

/**
 * Close database connection pool
 */
export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}
