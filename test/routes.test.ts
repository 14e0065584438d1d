import { describe, it, expect, beforeEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { InMemoryBaselineStore } from '../src/baseline/memory-store.js';
import { InMemoryEventStore } from '../src/incidents/event-store.js';
import { createBaselineRoutes } from '../src/routes/baselines.js';
import { createIncidentRoute } from '../src/routes/incidents.js';
import { createScanRoute } from '../src/routes/scan.js';
import { createTimelineRoute } from '../src/routes/timeline.js';
import { ScanService } from '../src/scan/service.js';
import { makeEvent, PLAY_CERT, TEST_CATEGORIES, TEST_NOW, TEST_TRUSTED_APPS } from './helpers.js';

const NOTES = {
  packageName: 'com.example.labs.notes',
  certSha256: PLAY_CERT,
  installerPackage: 'com.android.vending',
};

let app: FastifyInstance;

beforeEach(async () => {
  const baselineStore = new InMemoryBaselineStore();
  const service = new ScanService({
    baselineStore,
    eventStore: new InMemoryEventStore(),
    trustedApps: TEST_TRUSTED_APPS,
    categories: TEST_CATEGORIES,
    concurrency: 2,
    eventRetentionDays: 30,
  });
  app = Fastify();
  await createScanRoute(service)(app);
  await createBaselineRoutes(baselineStore)(app);
  await createIncidentRoute(service)(app);
  await createTimelineRoute(service)(app);
});

async function scanNotes(): Promise<void> {
  const res = await app.inject({ method: 'POST', url: '/v1/scan', payload: { apps: [NOTES], now: TEST_NOW } });
  expect(res.statusCode).toBe(200);
}

describe('POST /v1/scan', () => {
  it('returns 400 for an empty inventory', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/scan', payload: { apps: [] } });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Bad Request', message: 'apps: Array must contain at least 1 element(s)' });
  });

  it('names the offending field of an app', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/scan', payload: { apps: [{ packageName: '' }] } });
    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('apps.0.packageName: String must contain at least 1 character(s)');
  });

  it('scans the inventory', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/scan', payload: { apps: [NOTES], now: TEST_NOW } });
    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body.scannedAt).toBe(TEST_NOW);
    expect(body.summary.totalApps).toBe(1);
    expect(body.comparisons[0].status).toBe('NEW');
    expect(body.verdicts[0].effectiveRisk).toBe('SAFE');
  });
});

describe('GET /v1/baselines', () => {
  it('lists the stored baselines', async () => {
    await scanNotes();
    const res = await app.inject({ method: 'GET', url: '/v1/baselines' });
    expect(res.statusCode).toBe(200);
    expect(res.json().count).toBe(1);
    expect(res.json().baselines[0].packageName).toBe('com.example.labs.notes');
  });

  it('returns one baseline by package name', async () => {
    await scanNotes();
    const res = await app.inject({ method: 'GET', url: '/v1/baselines/com.example.labs.notes' });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ packageName: 'com.example.labs.notes', certSha256: PLAY_CERT, scanCount: 1 });
  });

  it('returns 400 for a malformed package name', async () => {
    const res = await app.inject({ method: 'GET', url: '/v1/baselines/not-a-package' });
    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('Invalid package name: not-a-package');
  });

  it('returns 404 for an unknown package', async () => {
    const res = await app.inject({ method: 'GET', url: '/v1/baselines/com.example.missing' });
    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ error: 'Not Found', message: 'No baseline stored for package: com.example.missing' });
  });
});

describe('POST /v1/incidents/resolve', () => {
  it('returns 400 without events', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/incidents/resolve', payload: { events: [] } });
    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('events: Array must contain at least 1 element(s)');
  });

  it('resolves each event into an incident', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/v1/incidents/resolve',
      payload: { events: [makeEvent()], now: TEST_NOW },
    });
    expect(res.statusCode).toBe(200);
    const [incident] = res.json().incidents;
    expect(incident.title).toBe('Security anomaly');
    expect(incident.status).toBe('OPEN');
    expect(incident.recommendedActions.map((a: { type: string }) => a.type)).toEqual(['MONITOR']);
  });
});

describe('POST /v1/timeline/analyze', () => {
  it('returns no timelines before any scan', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/timeline/analyze', payload: {} });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ timelines: [] });
  });

  it('returns 400 for a malformed package filter', async () => {
    const res = await app.inject({ method: 'POST', url: '/v1/timeline/analyze', payload: { packageNames: 'x' } });
    expect(res.statusCode).toBe(400);
    expect(res.json().message).toBe('packageNames: Expected array, received string');
  });
});
