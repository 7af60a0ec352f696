/**
 * Database Client
 *
 * Pool lifecycle and the transaction helper shared by the repository and the
 * migration runner.
 */

import pg from 'pg';

import { getGlobalLogger, type Logger } from '../logging/index.js';
import { loadDatabaseConfig, type DatabaseConfig } from './config.js';

const { Pool } = pg;
export type PoolType = InstanceType<typeof Pool>;
export type PoolClient = pg.PoolClient;

let sharedPool: PoolType | null = null;

/**
 * Build a pool from explicit settings. Errors raised by idle clients are
 * logged; without a listener pg would crash the process on them.
 */
export function createDatabasePool(
  config: DatabaseConfig,
  logger: Logger = getGlobalLogger().child('db')
): PoolType {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
    ssl: config.ssl,
    max: config.maxConnections,
    connectionTimeoutMillis: config.connectionTimeout,
    idleTimeoutMillis: config.idleTimeout,
  });

  pool.on('error', (error) => {
    logger.error('Idle database client failed', error);
  });

  return pool;
}

/**
 * Pool shared by the CLI scripts, built from the environment on first use
 */
export function getDatabasePool(): PoolType {
  sharedPool ??= createDatabasePool(loadDatabaseConfig());
  return sharedPool;
}

export async function closeDatabasePool(): Promise<void> {
  const pool = sharedPool;
  sharedPool = null;
  if (pool) {
    await pool.end();
  }
}

/**
 * Run `work` between BEGIN and COMMIT on an already-acquired client.
 * Any error rolls the transaction back and is rethrown; the client is
 * released either way.
 *
 * @example
 * ```typescript
 * const client = await pool.connect();
 * await withTransaction(client, async () => {
 *   await client.query('UPDATE blotters SET status = $2 WHERE id = $1', [id, 'success']);
 * });
 * ```
 */
export async function withTransaction<T>(client: PoolClient, work: () => Promise<T>): Promise<T> {
  try {
    await client.query('BEGIN');
    const result = await work();
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Round-trip a trivial query; false when the database cannot be reached
 */
export async function checkDatabaseConnection(pool: PoolType = getDatabasePool()): Promise<boolean> {
  try {
    await pool.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}
