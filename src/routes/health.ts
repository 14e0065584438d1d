import type { FastifyInstance } from 'fastify';
import { getPool } from '../db/index.js';
import type { BaselineStore } from '../baseline/store.js';

type StorageMode = 'postgres' | 'memory';

interface HealthResponse {
  status: 'ok' | 'degraded';
  storage: StorageMode;
  postgresConnected: boolean | null;
  baselineCount: number | null;
}

export interface HealthOptions {
  storage: StorageMode;
  baselineStore: BaselineStore;
}

async function checkPostgres(): Promise<boolean> {
  try {
    const pool = getPool();
    await pool.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}

export function createHealthRoutes(options: HealthOptions) {
  return async function registerHealthRoutes(server: FastifyInstance): Promise<void> {
    const usesPostgres = options.storage === 'postgres';

    // Liveness: 200 whenever the process is up
    server.get('/v1/health', { schema: { tags: ['Health'], summary: 'Liveness and storage status' } }, async (_request, reply) => {
      const pgConnected = usesPostgres ? await checkPostgres() : null;

      let baselineCount: number | null = null;
      if (pgConnected !== false) {
        baselineCount = await options.baselineStore.countBaselines();
      }

      const response: HealthResponse = {
        status: pgConnected === false ? 'degraded' : 'ok',
        storage: options.storage,
        postgresConnected: pgConnected,
        baselineCount,
      };
      return reply.send(response);
    });

    // Readiness: 200 only when the baseline store is reachable
    server.get('/v1/health/ready', { schema: { tags: ['Health'], summary: 'Readiness' } }, async (_request, reply) => {
      if (usesPostgres && !(await checkPostgres())) {
        return reply.status(503).send({
          error: 'Service Unavailable',
          message: 'PostgreSQL is not reachable',
        });
      }
      return reply.send({ status: 'ready' });
    });
  };
}
