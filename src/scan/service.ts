import { KeyedMutex } from '../baseline/keyed-mutex.js';
import { compareWithBaseline, findRemovedApps, snapshotFromEvidence, updateBaseline } from '../baseline/compare.js';
import type { BaselineStore } from '../baseline/store.js';
import type { BaselineComparison, BaselineRecord } from '../baseline/types.js';
import { detectCategory, type CategoryCatalog } from '../catalog/categories.js';
import type { SpecialAccessSnapshot } from '../catalog/clusters.js';
import { changesToSignals, compareSnapshots, configHash } from '../device/config-snapshot.js';
import type { ConfigSnapshot, DeviceIntegrityEvidence, ScannedAppEvidence } from '../evidence/input.js';
import { collectEvidence } from '../evidence/trust-evidence.js';
import type { TrustedAppsCatalog } from '../evidence/types.js';
import type { EventStore } from '../incidents/event-store.js';
import { buildFeatureVector, isNewApp } from '../incidents/feature-vector.js';
import { resolve, resolveAll } from '../incidents/root-cause.js';
import { baselineEvents, comboEvents, configEvents, specialAccessEvent } from '../incidents/signals.js';
import type { AppFeatureVector, SecurityEvent, SecurityIncident } from '../incidents/types.js';
import { createLogger } from '../logger.js';
import {
  appsEvaluatedTotal,
  appsSecurityScoreGauge,
  baselineAnomaliesTotal,
  baselineCountGauge,
  eventsRecordedTotal,
  incidentsCreatedTotal,
  scanDurationSeconds,
} from '../observability/metrics.js';
import { deriveFindings } from '../risk/derive-findings.js';
import { evaluate } from '../risk/evaluate.js';
import { classifyInstall } from '../risk/policy.js';
import { summarizeScan } from '../risk/summary.js';
import type { AppVerdict, ScanSummary } from '../risk/types.js';
import { analyze, analyzeAll, FRESH_INSTALL_THRESHOLD_MS } from '../timeline/install-timeline.js';
import type { TimelineResult } from '../timeline/types.js';
import { mapWithConcurrency } from './concurrency.js';
import type { ResolveRequest, ScanRequest, TimelineRequest } from './request.js';

const logger = createLogger('scan');

const DAY_MS = 24 * 60 * 60 * 1000;

/** Events at or above this severity are promoted to incidents. */
const PROMOTED_SEVERITIES: ReadonlySet<SecurityEvent['severity']> = new Set(['MEDIUM', 'HIGH', 'CRITICAL']);

export interface ScanServiceOptions {
  baselineStore: BaselineStore;
  eventStore: EventStore;
  trustedApps: TrustedAppsCatalog;
  categories: CategoryCatalog;
  concurrency: number;
  eventRetentionDays: number;
}

export interface AppScanResult {
  verdict: AppVerdict;
  comparison: BaselineComparison;
  featureVector: AppFeatureVector;
  events: SecurityEvent[];
}

export interface FailedApp {
  packageName: string;
  error: string;
}

export interface ScanResult {
  scannedAt: number;
  verdicts: AppVerdict[];
  comparisons: BaselineComparison[];
  incidents: SecurityIncident[];
  timelines: TimelineResult[];
  summary: ScanSummary;
  failed: FailedApp[];
}

interface AppContext {
  device: DeviceIntegrityEvidence;
  specialAccess: ReadonlyMap<string, SpecialAccessSnapshot>;
  hasAnyBaseline: boolean;
  now: number;
}

/**
 * Runs the per-app pipeline (evidence, baseline, findings, verdict, events)
 * and turns the events of a scan into incidents. Packages are processed in
 * parallel; each package's read-compare-write is serialized.
 */
export class ScanService {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly options: ScanServiceOptions) {}

  get baselineStore(): BaselineStore {
    return this.options.baselineStore;
  }

  /** The vector stored by the last scan that saw the package. */
  async featureVector(packageName: string): Promise<AppFeatureVector | null> {
    const [vector] = await this.options.baselineStore.listFeatureVectors([packageName]);
    return vector ?? null;
  }

  private async knowledgeOf(packageNames?: readonly string[]): Promise<Map<string, AppFeatureVector>> {
    const vectors = await this.options.baselineStore.listFeatureVectors(packageNames);
    return new Map(vectors.map((v) => [v.packageName, v]));
  }

  private expiresAt(now: number): number {
    return now + this.options.eventRetentionDays * DAY_MS;
  }

  private async evaluateApp(app: ScannedAppEvidence, ctx: AppContext): Promise<AppScanResult> {
    return this.mutex.runExclusive(app.packageName, async () => {
      const { trustedApps, categories, baselineStore } = this.options;
      const specialAccess = ctx.specialAccess.get(app.packageName) ?? null;

      const evidence = collectEvidence(app, ctx.device, trustedApps);
      const stored = await baselineStore.getBaseline(app.packageName);
      const snapshot = snapshotFromEvidence(app);
      const comparison = compareWithBaseline(snapshot, stored, { hasAnyBaseline: ctx.hasAnyBaseline });
      logger.debug({ packageName: app.packageName, status: comparison.status }, 'Baseline compared');

      const category = detectCategory(categories, app.packageName, app.appName);
      const expectedPermissions = categories.expectedPermissions[category] ?? [];
      const rawFindings = deriveFindings({
        app,
        evidence,
        comparison,
        stored,
        category,
        expectedPermissions,
        specialAccess,
      });

      const verdict = evaluate({
        packageName: app.packageName,
        trustEvidence: evidence,
        rawFindings,
        grantedPermissions: app.grantedPermissions,
        category,
        isNewApp: isNewApp(comparison),
        specialAccess,
        installClass: classifyInstall(
          app.isSystemApp,
          evidence.installerInfo.installerType,
          evidence.systemAppInfo.partition,
        ),
        expectedPermissions,
      });

      await baselineStore.upsertBaseline(updateBaseline(snapshot, stored, ctx.now));

      const featureVector = buildFeatureVector({
        app,
        evidence,
        comparison,
        verdict,
        category,
        specialAccess,
        now: ctx.now,
      });
      await baselineStore.saveFeatureVector(featureVector);

      const events = [...baselineEvents(comparison, ctx.now), ...comboEvents(app.packageName, verdict.matchedCombos, ctx.now)];
      if (specialAccess !== null) {
        const accessEvent = specialAccessEvent(specialAccess, ctx.now);
        if (accessEvent !== null) events.push(accessEvent);
      }

      appsEvaluatedTotal.inc({ effective_risk: verdict.effectiveRisk });
      for (const anomaly of comparison.anomalies) {
        baselineAnomaliesTotal.inc({ type: anomaly.type });
        logger.warn(
          { packageName: app.packageName, anomaly: anomaly.type, severity: anomaly.severity },
          anomaly.description,
        );
      }
      logger.info(
        {
          packageName: app.packageName,
          trustScore: verdict.trustScore,
          effectiveRisk: verdict.effectiveRisk,
          decisionRule: verdict.decisionRule,
        },
        'App evaluated',
      );

      return { verdict, comparison, featureVector, events };
    });
  }

  /** Compares the device config with the stored one; returns events for the changes. */
  private async checkConfig(config: ConfigSnapshot, now: number): Promise<SecurityEvent[]> {
    const store = this.options.baselineStore;
    const hash = configHash(config);
    const stored = await store.getConfigBaseline();

    if (stored !== null && stored.configHash === hash) return [];
    await store.saveConfigBaseline({ configHash: hash, snapshot: config, updatedAt: now });
    if (stored === null) {
      logger.info({ configHash: hash }, 'Config baseline created');
      return [];
    }

    const delta = compareSnapshots(stored.snapshot, config);
    logger.warn({ changes: delta.changes.map((c) => c.type) }, 'Device configuration changed');
    return configEvents(changesToSignals(delta, now), now);
  }

  async scan(request: ScanRequest): Promise<ScanResult> {
    const now = request.now ?? Date.now();
    const endTimer = scanDurationSeconds.startTimer();
    const { baselineStore, eventStore, concurrency } = this.options;

    const hasAnyBaseline = (await baselineStore.countBaselines()) > 0;
    const specialAccess = new Map(request.specialAccess.map((s) => [s.packageName, s]));
    const ctx: AppContext = { device: request.device, specialAccess, hasAnyBaseline, now };

    logger.info({ apps: request.apps.length, hasAnyBaseline, concurrency }, 'Scan started');

    const failed: FailedApp[] = [];
    const outcomes = await mapWithConcurrency(request.apps, concurrency, async (app) => {
      try {
        return await this.evaluateApp(app, ctx);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error({ packageName: app.packageName, error: message }, 'App evaluation failed');
        failed.push({ packageName: app.packageName, error: message });
        return null;
      }
    });
    const results = outcomes.filter((r): r is AppScanResult => r !== null);

    let removed: BaselineComparison[] = [];
    let storedBaselines: BaselineRecord[] | null = null;
    if (request.fullInventory) {
      storedBaselines = await baselineStore.listBaselines();
      removed = findRemovedApps(
        storedBaselines,
        request.apps.map((a) => a.packageName),
      );
      await baselineStore.clearFeatureVectors(removed.map((r) => r.packageName));
      if (removed.length > 0) logger.info({ removed: removed.map((r) => r.packageName) }, 'Packages removed since last scan');
    }

    const events = results.flatMap((r) => r.events);
    if (request.config !== null) events.push(...(await this.checkConfig(request.config, now)));

    const inserted = await eventStore.recordEvents(events, this.expiresAt(now));
    eventsRecordedTotal.inc(inserted);

    const incidents = await this.promote(events, now);

    const verdicts = results.map((r) => r.verdict);
    const summary = summarizeScan(verdicts);
    appsSecurityScoreGauge.set(summary.appsSecurityScore);
    baselineCountGauge.set(storedBaselines?.length ?? (await baselineStore.countBaselines()));

    const timelines = analyzeAll(
      results.map((r) => r.featureVector),
      await eventStore.listEvents({ since: now - FRESH_INSTALL_THRESHOLD_MS }),
      now,
    );

    const seconds = endTimer();
    logger.info(
      {
        apps: verdicts.length,
        failed: failed.length,
        events: events.length,
        newEvents: inserted,
        incidents: incidents.length,
        score: summary.appsSecurityScore,
        durationMs: Math.round(seconds * 1000),
      },
      'Scan completed',
    );

    return {
      scannedAt: now,
      verdicts,
      comparisons: [...results.map((r) => r.comparison), ...removed],
      incidents,
      timelines,
      summary,
      failed,
    };
  }

  /**
   * Resolves the scan's notable events that have not been promoted before,
   * with the package's stored history as correlation context.
   */
  private async promote(events: readonly SecurityEvent[], now: number): Promise<SecurityIncident[]> {
    const { eventStore } = this.options;
    const candidates = events.filter((e) => PROMOTED_SEVERITIES.has(e.severity));
    if (candidates.length === 0) return [];

    const stored = await eventStore.listEvents({ ids: candidates.map((e) => e.id) });
    const promoted = new Set(stored.filter((e) => e.isPromoted).map((e) => e.id));
    const notable = candidates.filter((e) => !promoted.has(e.id));
    if (notable.length === 0) return [];

    const packages = [...new Set(notable.flatMap((e) => (e.packageName === null ? [] : [e.packageName])))];
    const knowledgeByPackage = await this.knowledgeOf(packages);
    const configSnapshot = (await this.options.baselineStore.getConfigBaseline())?.snapshot ?? null;
    const history = await eventStore.listEvents({ since: now - this.options.eventRetentionDays * DAY_MS });
    const timelines = new Map<string, TimelineResult>();
    const incidents: SecurityIncident[] = [];

    for (const event of notable) {
      const pkg = event.packageName;
      const knowledge = pkg === null ? null : (knowledgeByPackage.get(pkg) ?? null);
      let timeline: TimelineResult | null = null;
      if (pkg !== null && knowledge !== null) {
        timeline = timelines.get(pkg) ?? analyze(knowledge, history, now);
        timelines.set(pkg, timeline);
      }
      const incident = resolve(event, {
        appKnowledge: knowledge,
        configSnapshot,
        recentEvents: history.filter((e) => e.packageName === pkg && e.id !== event.id),
        timeline,
        now,
      });
      incidentsCreatedTotal.inc({ severity: incident.severity });
      incidents.push(incident);
    }

    await eventStore.markPromoted(notable.map((e) => e.id));
    return incidents;
  }

  /** Resolves caller-supplied events against what the stored scans learned about each app. */
  async resolveEvents(request: ResolveRequest): Promise<SecurityIncident[]> {
    const now = request.now ?? Date.now();
    const knowledge = await this.knowledgeOf();
    const timelines = new Map<string, TimelineResult>();
    for (const [pkg, vector] of knowledge) {
      timelines.set(pkg, analyze(vector, request.events, now));
    }
    const incidents = resolveAll(request.events, {
      appKnowledge: knowledge,
      configSnapshot: request.config ?? (await this.options.baselineStore.getConfigBaseline())?.snapshot ?? null,
      timelines,
      now,
    });
    for (const i of incidents) incidentsCreatedTotal.inc({ severity: i.severity });
    return incidents;
  }

  async analyzeTimelines(request: TimelineRequest): Promise<TimelineResult[]> {
    const now = request.now ?? Date.now();
    const vectors = await this.options.baselineStore.listFeatureVectors(request.packageNames);
    const events = await this.options.eventStore.listEvents({ since: now - FRESH_INSTALL_THRESHOLD_MS });
    return analyzeAll(vectors, events, now);
  }

  async cleanupExpired(now: number = Date.now()): Promise<number> {
    const deleted = await this.options.eventStore.deleteExpired(now);
    if (deleted > 0) logger.info({ deleted }, 'Expired events deleted');
    return deleted;
  }
}
