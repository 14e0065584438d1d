import 'dotenv/config';
import Fastify from 'fastify';
import { loadConfig } from './config/index.js';
import { loadTrustedApps } from './config/trusted-apps.js';
import { loadAppCategories } from './config/app-categories.js';
import { InMemoryBaselineStore, PgBaselineStore, type BaselineStore } from './baseline/index.js';
import { InMemoryEventStore, PgEventStore, type EventStore } from './incidents/index.js';
import { ScanService } from './scan/index.js';
import { createHealthRoutes } from './routes/health.js';
import { createScanRoute } from './routes/scan.js';
import { createBaselineRoutes } from './routes/baselines.js';
import { createIncidentRoute } from './routes/incidents.js';
import { createTimelineRoute } from './routes/timeline.js';
import { registry, requestDurationSeconds } from './observability/metrics.js';
import { getPool, closePool, isDatabaseConfigured, runMigrations } from './db/index.js';
import { registerSwagger } from './swagger.js';
import { createLogger } from './logger.js';

const logger = createLogger('main');

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
  const config = loadConfig();

  // 1. Reference data
  const trustedApps = loadTrustedApps(config.TRUSTED_APPS_PATH);
  const categories = loadAppCategories(config.APP_CATEGORIES_PATH);
  logger.info(
    { developers: trustedApps.developers.length, categoryRules: categories.rules.length },
    'Reference data loaded',
  );

  // 2. Storage: PostgreSQL when configured, process memory otherwise
  let baselineStore: BaselineStore;
  let eventStore: EventStore;
  const storage = isDatabaseConfigured() ? 'postgres' : 'memory';
  if (storage === 'postgres') {
    logger.info('Connecting to PostgreSQL and running migrations...');
    const applied = await runMigrations(getPool());
    if (applied.length > 0) {
      logger.info({ migrations: applied }, 'Applied database migrations');
    }
    baselineStore = new PgBaselineStore();
    eventStore = new PgEventStore();
  } else {
    logger.warn('DATABASE_URL not set; baselines and events are kept in memory only');
    baselineStore = new InMemoryBaselineStore();
    eventStore = new InMemoryEventStore();
  }

  const service = new ScanService({
    baselineStore,
    eventStore,
    trustedApps,
    categories,
    concurrency: config.SCAN_CONCURRENCY,
    eventRetentionDays: config.EVENT_RETENTION_DAYS,
  });

  const server = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
    bodyLimit: 10 * 1024 * 1024,
  });

  // Request duration tracking
  server.addHook('onResponse', (request, reply, done) => {
    const url = request.routeOptions?.url ?? request.url;
    if (!url.startsWith('/metrics') && !url.startsWith('/v1/health')) {
      const duration = reply.elapsedTime / 1000;
      requestDurationSeconds.observe({ endpoint: url, status_code: reply.statusCode }, duration);
    }
    done();
  });

  await registerSwagger(server);
  await createHealthRoutes({ storage, baselineStore })(server);

  server.get('/metrics', { schema: { tags: ['Metrics'] } }, async (_request, reply) => {
    reply.header('Content-Type', registry.contentType);
    return registry.metrics();
  });

  await createScanRoute(service)(server);
  await createBaselineRoutes(baselineStore)(server);
  await createIncidentRoute(service)(server);
  await createTimelineRoute(service)(server);

  // 3. Periodic removal of expired events
  const cleanup = setInterval(() => {
    service.cleanupExpired().catch((err) => {
      logger.error({ err }, 'Expired event cleanup failed');
    });
  }, CLEANUP_INTERVAL_MS);
  cleanup.unref();

  // 4. Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received');
    clearInterval(cleanup);
    await server.close();
    if (storage === 'postgres') await closePool();
    logger.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await server.listen({ port: config.PORT, host: '0.0.0.0' });
  server.log.info(`Trust & Risk Decision Engine started (storage=${storage})`);
  server.log.info('Health: /v1/health | Readiness: /v1/health/ready | Metrics: /metrics | Docs: /docs');
}

main().catch((err) => {
  console.error('Failed to start engine:', err);
  process.exit(1);
});
