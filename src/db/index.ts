export { getPool, closePool, isDatabaseConfigured } from './client.js';
export { runMigrations, getPendingMigrations } from './migrate.js';
