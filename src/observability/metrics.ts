import { Registry, Gauge, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();

// Collect Node.js default metrics (GC, event loop, memory, etc.)
collectDefaultMetrics({ register: registry });

// --- Gauges ---

export const appsSecurityScoreGauge = new Gauge({
  name: 'engine_apps_security_score',
  help: 'Apps security score of the last completed scan (0-100)',
  registers: [registry],
});

export const baselineCountGauge = new Gauge({
  name: 'engine_baseline_count',
  help: 'Number of packages with a stored baseline after the last scan',
  registers: [registry],
});

// --- Counters ---

export const appsEvaluatedTotal = new Counter({
  name: 'engine_apps_evaluated_total',
  help: 'Total number of app verdicts produced',
  labelNames: ['effective_risk'] as const,
  registers: [registry],
});

export const baselineAnomaliesTotal = new Counter({
  name: 'engine_baseline_anomalies_total',
  help: 'Total number of baseline anomalies detected',
  labelNames: ['type'] as const,
  registers: [registry],
});

export const incidentsCreatedTotal = new Counter({
  name: 'engine_incidents_created_total',
  help: 'Total number of incidents created',
  labelNames: ['severity'] as const,
  registers: [registry],
});

export const eventsRecordedTotal = new Counter({
  name: 'engine_events_recorded_total',
  help: 'Total number of new security events persisted',
  registers: [registry],
});

// --- Histograms ---

export const scanDurationSeconds = new Histogram({
  name: 'engine_scan_duration_seconds',
  help: 'Duration of a full device scan in seconds',
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 30],
  registers: [registry],
});

export const requestDurationSeconds = new Histogram({
  name: 'engine_request_duration_seconds',
  help: 'Duration of HTTP requests in seconds',
  labelNames: ['endpoint', 'status_code'] as const,
  buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});
