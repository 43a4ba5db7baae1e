import { Pool, PoolClient, PoolConfig } from 'pg';
import { logger } from '../utils/logger';

const isTest = process.env.NODE_ENV === 'test';

const config: PoolConfig = {
     connectionString: process.env.DATABASE_URL,
     // In test mode, use minimal connections and short timeouts
     min: isTest ? 0 : parseInt(process.env.DB_POOL_MIN || '2', 10),
     max: isTest ? 2 : parseInt(process.env.DB_POOL_MAX || '10', 10),
     idleTimeoutMillis: isTest ? 100 : parseInt(process.env.DB_IDLE_TIMEOUT_MS || '10000', 10),
     connectionTimeoutMillis: parseInt(process.env.DB_CONNECTION_TIMEOUT_MS || '5000', 10),
};
export const pool = new Pool(config);

pool.on('error', (err) => {
     logger.error({ err }, 'Unexpected PostgreSQL pool error');
});

export async function checkConnection(): Promise<boolean> {
     let client: PoolClient | undefined;
     try {
          client = await pool.connect();
          await client.query('SELECT 1');
          return true;
     } catch (err) {
          logger.error({ err }, 'Database connection check failed');
          return false;
     } finally {
          client?.release();
     }
}

/**
 * Runs `fn` inside BEGIN/COMMIT on a dedicated client. Any rejection rolls
 * the transaction back and is rethrown.
 */
export async function withTransaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          await client.query('BEGIN');
          const result = await fn(client);
          await client.query('COMMIT');
          return result;
     } catch (err) {
          await client.query('ROLLBACK');
          throw err;
     } finally {
          client.release();
     }
}

// Connection helper for non-transactional queries
export async function withConnection<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
     const client = await pool.connect();
     try {
          return await fn(client);
     } finally {
          client.release();
     }
}

export async function closePool(): Promise<void> {
     await pool.end();
     logger.info('Database pool closed');
}
