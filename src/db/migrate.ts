import { readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { createLogger } from '../logger.js';

const logger = createLogger('migrate');

const MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations', import.meta.url));

export async function ensureMigrationsTable(pool: pg.Pool): Promise<void> {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);
}

export async function getPendingMigrations(pool: pg.Pool): Promise<string[]> {
  const result = await pool.query<{ name: string }>('SELECT name FROM schema_migrations ORDER BY id ASC');
  const applied = new Set(result.rows.map((row) => row.name));
  const files = await readdir(MIGRATIONS_DIR);
  return files
    .filter((f) => f.endsWith('.sql'))
    .sort()
    .filter((f) => !applied.has(f));
}

/** Applies every pending migration, each in its own transaction. Returns the applied file names. */
export async function runMigrations(pool: pg.Pool): Promise<string[]> {
  await ensureMigrationsTable(pool);
  const pending = await getPendingMigrations(pool);

  const applied: string[] = [];
  for (const migration of pending) {
    const sql = await readFile(join(MIGRATIONS_DIR, migration), 'utf-8');
    const client = await pool.connect();
    try {
      await client.query('BEGIN');
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [migration]);
      await client.query('COMMIT');
      logger.debug({ migration }, 'Migration applied');
      applied.push(migration);
    } catch (err) {
      await client.query('ROLLBACK');
      throw new Error(`Migration ${migration} failed: ${String(err)}`);
    } finally {
      client.release();
    }
  }

  return applied;
}
