import type { CapabilityCluster } from '../catalog/clusters.js';
import { LOW_TRUST_THRESHOLD } from '../catalog/combos.js';
import type { ConfigSnapshot } from '../evidence/input.js';
import { HIGH_TRUST_THRESHOLD } from '../evidence/trust-evidence.js';
import type { TimelineResult } from '../timeline/types.js';
import { hasActiveSpecialAccess } from './feature-vector.js';
import { deterministicId } from './signals.js';
import type {
  AppFeatureVector,
  EventType,
  Hypothesis,
  RecommendedAction,
  SecurityEvent,
  SecurityIncident,
} from './types.js';

export const CORRELATION_BOOST = 0.1;
export const CORRELATION_MIN_EVENTS = 2;
export const UNINSTALL_CONFIDENCE = 0.7;
export const TIMELINE_HIGH_CONFIDENCE_BOOST = 0.15;
export const TIMELINE_CANDIDATE_BOOST = 0.1;

const DEVICE_KEY = '__device__';
const CORRELATION_NOTE = 'Several security events for this app in a short time';

const SETTINGS_EVENT_TYPES: ReadonlySet<EventType> = new Set<EventType>(['CONFIG_TAMPER', 'CA_CERT_INSTALLED']);

export interface ResolveContext {
  appKnowledge?: AppFeatureVector | null;
  configSnapshot?: ConfigSnapshot | null;
  recentEvents?: readonly SecurityEvent[];
  timeline?: TimelineResult | null;
  /** Defaults to the event's end time. */
  now?: number;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/** Accumulates a hypothesis, clamping confidence after every step. */
class HypothesisDraft {
  private confidence: number;
  private readonly supporting: string[] = [];
  private readonly contradicting: string[] = [];

  constructor(
    private readonly name: string,
    private readonly description: string,
    base: number,
    private readonly mitre: string[] = [],
  ) {
    this.confidence = clamp01(base);
  }

  support(note: string, delta = 0): this {
    this.supporting.push(note);
    this.confidence = clamp01(this.confidence + delta);
    return this;
  }

  contradict(note: string, delta: number): this {
    this.contradicting.push(note);
    this.confidence = clamp01(this.confidence - delta);
    return this;
  }

  build(): Hypothesis {
    return {
      name: this.name,
      description: this.description,
      confidence: this.confidence,
      supportingEvidence: [...this.supporting],
      contradictingEvidence: [...this.contradicting],
      mitreTechniques: [...this.mitre],
    };
  }
}

const H = {
  stalkerware: 'Stalkerware or monitoring app',
  dropper: 'Dropper installing further malware',
  supplyChain: 'Supply-chain compromise',
  legitimateUpdate: 'Legitimate update',
  escalation: 'Privilege escalation',
  featureAddition: 'New feature added',
  maliciousAccess: 'Special access abuse',
  legitimateAccess: 'Legitimate special access',
  configTamper: 'Device configuration tampering',
  mitm: 'Man-in-the-middle interception',
  corporate: 'Corporate or MDM configuration',
  overlay: 'Overlay phishing attack',
  bankingOverlay: 'Banking overlay attack',
  stagedPayload: 'Staged payload dropper',
  loader: 'Loader downloading code at runtime',
  generic: 'Security anomaly',
} as const;

const TIMELINE_SENSITIVE: ReadonlySet<string> = new Set<string>([H.dropper, H.stagedPayload, H.loader]);

function isSideloaded(app: AppFeatureVector | null): boolean {
  return app?.identity.installerType === 'SIDELOADED';
}

function hasCluster(app: AppFeatureVector, cluster: CapabilityCluster): boolean {
  return app.capability.activeHighRiskClusters.includes(cluster);
}

function stalkerware(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.stalkerware, 'The app has the capabilities typical of surveillance software', 0.7, [
    'T1417',
    'T1513',
  ]).support('Accessibility combined with notification access');
  if (app !== null) {
    if (isSideloaded(app)) h.support('Sideloaded install', 0.15);
    if (app.identity.trustScore < LOW_TRUST_THRESHOLD) h.support(`Low trust (${app.identity.trustScore})`, 0.1);
    else h.contradict(`Higher trust (${app.identity.trustScore})`, 0.15);
  }
  return h.build();
}

function dropper(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.dropper, 'The app may install malicious packages on its own', 0.6, ['T1544']).support(
    'Accessibility combined with package installs',
  );
  if (app !== null) {
    if (app.identity.trustScore < LOW_TRUST_THRESHOLD) h.support(`Low trust (${app.identity.trustScore})`, 0.15);
    if (isSideloaded(app)) h.support('Sideloaded install', 0.1);
    if (app.identity.isNewApp) h.support('Freshly installed app', 0.1);
    if (hasCluster(app, 'OVERLAY')) h.support('Overlay permission, possible banking attack', 0.1);
    if (app.identity.trustScore >= HIGH_TRUST_THRESHOLD) h.contradict(`Higher trust (${app.identity.trustScore})`, 0.2);
  }
  return h.build();
}

function supplyChain(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.supplyChain, 'The app update may have been compromised', 0.4, ['T1195']).support(
    'Suspicious update',
  );
  if (app?.change.isVersionRollback === true) h.support('Version went down (rollback)', 0.3);
  return h.build();
}

function legitimateUpdate(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.legitimateUpdate, 'A regular update from a known developer', 0.3);
  if ((app?.identity.trustScore ?? 0) >= HIGH_TRUST_THRESHOLD) h.support('High developer trust', 0.4);
  return h.build();
}

function escalation(): Hypothesis {
  return new HypothesisDraft(H.escalation, 'The app gained new dangerous capabilities', 0.5, ['T1548'])
    .support('New high-risk permissions added')
    .build();
}

function featureAddition(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.featureAddition, 'The developer added features that need the permissions', 0.3).support(
    'Ordinary app development',
  );
  if ((app?.identity.trustScore ?? 0) >= HIGH_TRUST_THRESHOLD) h.support('High developer trust', 0.3);
  return h.build();
}

function maliciousAccess(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(
    H.maliciousAccess,
    'Special access can be abused for surveillance or manipulation',
    0.4,
    ['T1628'],
  ).support('Special access enabled');
  if (isSideloaded(app)) h.support('Sideloaded app', 0.2);
  return h.build();
}

function legitimateAccess(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.legitimateAccess, 'The user granted access to a trusted app', 0.3).support(
    'Granted by the user',
  );
  if ((app?.identity.trustScore ?? 0) >= HIGH_TRUST_THRESHOLD) h.support('High developer trust', 0.4);
  return h.build();
}

function configTamper(): Hypothesis {
  return new HypothesisDraft(H.configTamper, 'Device settings changed in a way that can weaken security', 0.5)
    .support('Configuration change detected')
    .build();
}

function mitm(config: ConfigSnapshot | null): Hypothesis {
  const h = new HypothesisDraft(H.mitm, 'A CA certificate allows intercepting encrypted traffic', 0.5, ['T1557']).support(
    'User CA certificate installed',
  );
  if (config?.vpnActive === true) h.support('VPN active at the same time', 0.2);
  return h.build();
}

function corporate(): Hypothesis {
  return new HypothesisDraft(H.corporate, 'The CA certificate was installed for work use', 0.4)
    .support('Common on managed devices')
    .build();
}

function overlay(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.overlay, 'The app can cover other apps with a fake UI', 0.6, ['T1660']).support(
    'Overlay with low trust',
  );
  if (app !== null) {
    if (isSideloaded(app)) h.support('Sideloaded app', 0.15);
    if (app.identity.trustScore < LOW_TRUST_THRESHOLD) h.support(`Low trust (${app.identity.trustScore})`, 0.1);
    if (app.identity.trustScore >= HIGH_TRUST_THRESHOLD) h.contradict(`Higher trust (${app.identity.trustScore})`, 0.2);
  }
  return h.build();
}

function bankingOverlay(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(
    H.bankingOverlay,
    'The app follows the banking trojan pattern of overlays over financial apps',
    0.45,
    ['T1660', 'T1417'],
  ).support('Overlay permission with a suspicious profile');
  if (app !== null) {
    if (hasCluster(app, 'ACCESSIBILITY')) h.support('Accessibility with overlay', 0.2);
    if (isSideloaded(app)) h.support('Sideloaded install', 0.15);
    if (app.identity.trustScore < LOW_TRUST_THRESHOLD) h.support(`Low trust (${app.identity.trustScore})`, 0.1);
    if (app.identity.isNewApp) h.support('Freshly installed app', 0.1);
    if (app.identity.trustScore >= HIGH_TRUST_THRESHOLD) h.contradict(`Higher trust (${app.identity.trustScore})`, 0.25);
  }
  return h.build();
}

function stagedPayload(app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(
    H.stagedPayload,
    'The app looked harmless at first and escalated its permissions later',
    0.55,
    ['T1544', 'T1407'],
  ).support('Install followed by permission escalation');
  if (app !== null) {
    if (app.identity.isNewApp) h.support('Freshly installed app', 0.15);
    if (hasCluster(app, 'INSTALL_PACKAGES')) h.support('Can install other apps', 0.15);
    if (isSideloaded(app)) h.support('Sideloaded install', 0.1);
    if (app.identity.trustScore < LOW_TRUST_THRESHOLD) h.support(`Low trust (${app.identity.trustScore})`, 0.1);
    if (app.identity.trustScore >= HIGH_TRUST_THRESHOLD) h.contradict('Higher app trust', 0.25);
  }
  return h.build();
}

function loader(event: SecurityEvent, app: AppFeatureVector | null): Hypothesis {
  const h = new HypothesisDraft(H.loader, 'The app downloads and runs code at runtime', 0.5, ['T1407', 'T1544']).support(
    'Dynamic code loading after install',
  );
  if (app !== null) {
    if (app.identity.isNewApp) h.support('Freshly installed app', 0.15);
    if (isSideloaded(app)) h.support('Sideloaded install', 0.15);
    if (app.identity.trustScore < LOW_TRUST_THRESHOLD) h.support(`Low trust (${app.identity.trustScore})`, 0.1);
    const networkBurst = event.signals.some(
      (s) => s.type === 'NETWORK_BURST_ANOMALY' || s.type === 'NETWORK_AFTER_INSTALL',
    );
    if (networkBurst) h.support('Network traffic after install, likely a payload download', 0.15);
    if (app.identity.trustScore >= HIGH_TRUST_THRESHOLD) h.contradict('Higher app trust', 0.2);
  }
  return h.build();
}

function generic(event: SecurityEvent): Hypothesis {
  return new HypothesisDraft(H.generic, event.summary, 0.3).support('Detected automatically').build();
}

function candidates(
  event: SecurityEvent,
  app: AppFeatureVector | null,
  config: ConfigSnapshot | null,
): Hypothesis[] {
  switch (event.type) {
    case 'STALKERWARE_PATTERN':
      return [stalkerware(app)];
    case 'DROPPER_PATTERN':
      return [dropper(app)];
    case 'SUSPICIOUS_UPDATE':
      return [supplyChain(app), legitimateUpdate(app)];
    case 'CAPABILITY_ESCALATION':
      return [escalation(), featureAddition(app)];
    case 'SPECIAL_ACCESS_GRANT':
      return [maliciousAccess(app), legitimateAccess(app)];
    case 'CONFIG_TAMPER':
      return [configTamper()];
    case 'CA_CERT_INSTALLED':
      return [mitm(config), corporate()];
    case 'OVERLAY_ATTACK_PATTERN':
      return [overlay(app), bankingOverlay(app)];
    case 'STAGED_PAYLOAD':
      return [stagedPayload(app), dropper(app)];
    case 'LOADER_BEHAVIOR':
      return [loader(event, app), generic(event)];
    default:
      return [generic(event)];
  }
}

function boost(h: Hypothesis, delta: number, note: string): Hypothesis {
  return {
    ...h,
    confidence: clamp01(h.confidence + delta),
    supportingEvidence: [...h.supportingEvidence, note],
  };
}

function timelineBoost(timeline: TimelineResult | null): number {
  if (timeline === null) return 0;
  if (timeline.isHighConfidenceDropper) return TIMELINE_HIGH_CONFIDENCE_BOOST;
  if (timeline.isDropperCandidate) return TIMELINE_CANDIDATE_BOOST;
  return 0;
}

/** Candidate hypotheses for an event, highest confidence first. */
export function generateHypotheses(event: SecurityEvent, ctx: ResolveContext = {}): Hypothesis[] {
  const app = ctx.appKnowledge ?? null;
  let hypotheses = candidates(event, app, ctx.configSnapshot ?? null);

  const sameApp = (ctx.recentEvents ?? []).filter((e) => e.packageName === event.packageName);
  if (sameApp.length >= CORRELATION_MIN_EVENTS) {
    hypotheses = hypotheses.map((h) => boost(h, CORRELATION_BOOST, CORRELATION_NOTE));
  }

  const timeline = ctx.timeline ?? null;
  const delta = timelineBoost(timeline);
  if (timeline !== null && delta > 0) {
    const note = `Install timeline score ${timeline.score.toFixed(2)}`;
    hypotheses = hypotheses.map((h) => (TIMELINE_SENSITIVE.has(h.name) ? boost(h, delta, note) : h));
  }

  // Stable: equal confidences keep catalog order.
  return hypotheses
    .map((h, i) => ({ h, i }))
    .sort((a, b) => b.h.confidence - a.h.confidence || a.i - b.i)
    .map(({ h }) => h);
}

export function generateActions(
  event: SecurityEvent,
  app: AppFeatureVector | null,
  top: Hypothesis | null,
): RecommendedAction[] {
  const actions: RecommendedAction[] = [];
  const pkg = event.packageName;

  if (pkg !== null && top !== null && top.confidence > UNINSTALL_CONFIDENCE) {
    actions.push({
      priority: 1,
      type: 'UNINSTALL',
      title: 'Uninstall the app',
      description: 'Removing this suspicious app is recommended',
      targetPackage: pkg,
    });
  }

  if (pkg !== null && app !== null && hasActiveSpecialAccess(app)) {
    actions.push({
      priority: 2,
      type: 'REVOKE_SPECIAL_ACCESS',
      title: 'Revoke special access',
      description: 'Turn off the special access in system settings',
      targetPackage: pkg,
    });
  }

  if (SETTINGS_EVENT_TYPES.has(event.type)) {
    actions.push({
      priority: 1,
      type: 'CHECK_SETTINGS',
      title: 'Review settings',
      description: 'Review the security settings of the device',
      targetPackage: null,
    });
  }

  actions.push({
    priority: actions.length + 1,
    type: 'MONITOR',
    title: 'Keep monitoring',
    description: 'Watch this app or situation in the next scans',
    targetPackage: pkg,
  });

  return actions;
}

/** Builds one incident for one event. Pure: the same inputs give the same incident. */
export function resolve(event: SecurityEvent, ctx: ResolveContext = {}): SecurityIncident {
  const app = ctx.appKnowledge ?? null;
  const hypotheses = generateHypotheses(event, ctx);
  const top = hypotheses[0] ?? null;
  const now = ctx.now ?? event.endTime;

  return {
    id: deterministicId('incident', event.id),
    createdAt: now,
    updatedAt: now,
    severity: event.severity,
    status: 'OPEN',
    title: top?.name ?? event.summary,
    summary: top?.description ?? event.summary,
    packageName: event.packageName,
    affectedPackages: event.packageName === null ? [] : [event.packageName],
    events: [event],
    hypotheses,
    recommendedActions: generateActions(event, app, top),
  };
}

export interface ResolveAllContext {
  appKnowledge?: ReadonlyMap<string, AppFeatureVector>;
  configSnapshot?: ConfigSnapshot | null;
  timelines?: ReadonlyMap<string, TimelineResult>;
  now?: number;
}

/**
 * Groups events by package and resolves each one. The recent events handed
 * to a resolution are those of the other groups.
 */
export function resolveAll(events: readonly SecurityEvent[], ctx: ResolveAllContext = {}): SecurityIncident[] {
  const groups = new Map<string, SecurityEvent[]>();
  for (const event of events) {
    const key = event.packageName ?? DEVICE_KEY;
    const group = groups.get(key);
    if (group) group.push(event);
    else groups.set(key, [event]);
  }

  const incidents: SecurityIncident[] = [];
  for (const [key, group] of groups) {
    const isDevice = key === DEVICE_KEY;
    const others = events.filter((e) => (e.packageName ?? DEVICE_KEY) !== key);
    for (const event of group) {
      incidents.push(
        resolve(event, {
          appKnowledge: isDevice ? null : ctx.appKnowledge?.get(key) ?? null,
          configSnapshot: ctx.configSnapshot ?? null,
          recentEvents: others,
          timeline: isDevice ? null : ctx.timelines?.get(key) ?? null,
          now: ctx.now,
        }),
      );
    }
  }
  return incidents;
}
