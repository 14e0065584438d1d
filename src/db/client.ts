import pg from 'pg';
import { getConfig } from '../config/index.js';

const { Pool } = pg;

let _pool: pg.Pool | null = null;

export function isDatabaseConfigured(): boolean {
  return getConfig().DATABASE_URL !== undefined;
}

export function getPool(): pg.Pool {
  if (_pool === null) {
    const config = getConfig();
    if (config.DATABASE_URL === undefined) {
      throw new Error('DATABASE_URL is not configured');
    }
    _pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: 20,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    });
  }
  return _pool;
}

export async function closePool(): Promise<void> {
  if (_pool !== null) {
    await _pool.end();
    _pool = null;
  }
}
