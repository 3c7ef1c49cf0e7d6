import { Pool } from 'pg';
import type { DbConfig } from './config';
import logger from './logger';
import { incrementCounter, setGaugeValue } from './observability/metrics';

export type QueryRow = Record<string, unknown>;

export type QueryFn = (text: string, params?: unknown[]) => Promise<{ rows: QueryRow[] }>;

export interface Database {
  query: QueryFn;
  /** Runs `fn` on one pooled connection inside BEGIN/COMMIT. */
  transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error('DB query timed out')), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function createDatabase(config: DbConfig): Database {
  const pool = new Pool({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
  });

  pool.on('error', (err) => {
    setGaugeValue('mosmix_db_up', 0);
    logger.error({ err }, '[db] idle client error');
  });

  const query: QueryFn = async (text, params) => {
    try {
      const result = await withTimeout(pool.query(text, params), config.queryTimeoutMs);
      return { rows: result.rows };
    } catch (err) {
      incrementCounter('mosmix_db_error_total', { operation: 'query' });
      logger.error({ err }, '[db] query failed');
      throw err;
    }
  };

  return {
    query,
    async transaction<T>(fn: (q: QueryFn) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      const scoped: QueryFn = async (text, params) => {
        const result = await withTimeout(client.query(text, params), config.queryTimeoutMs);
        return { rows: result.rows };
      };
      try {
        await scoped('BEGIN');
        const value = await fn(scoped);
        await scoped('COMMIT');
        return value;
      } catch (err) {
        incrementCounter('mosmix_db_error_total', { operation: 'transaction' });
        await scoped('ROLLBACK').catch((rollbackErr: unknown) => {
          logger.error({ err: rollbackErr }, '[db] rollback failed');
        });
        throw err;
      } finally {
        client.release();
      }
    },
    async ping() {
      try {
        await withTimeout(pool.query('SELECT 1'), config.queryTimeoutMs);
        setGaugeValue('mosmix_db_up', 1);
        return true;
      } catch (err) {
        setGaugeValue('mosmix_db_up', 0);
        incrementCounter('mosmix_db_error_total', { operation: 'ping' });
        logger.warn('[db] ping failed', { err });
        return false;
      }
    },
    async close() {
      await pool.end();
    },
  };
}
