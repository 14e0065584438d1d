import { createHash } from 'node:crypto';
import type { AnomalyType, BaselineComparison } from '../baseline/types.js';
import {
  activeSpecialAccessLabels,
  hasAnySpecialAccess,
  type CapabilityCluster,
  type SpecialAccessSnapshot,
} from '../catalog/clusters.js';
import { DANGEROUS_COMBOS, type DangerousCombo } from '../catalog/combos.js';
import type { Severity } from '../catalog/severity.js';
import {
  SIGNAL_SEVERITY_ORDER,
  type EventType,
  type SecurityEvent,
  type SecuritySignal,
  type SignalSeverity,
  type SignalSource,
  type SignalType,
} from './types.js';

/** SHA-256 of `prefix:key`, hex. Same input, same ID, so re-recording deduplicates. */
export function deterministicId(prefix: string, key: string): string {
  return createHash('sha256').update(`${prefix}:${key}`, 'utf8').digest('hex');
}

export function toSignalSeverity(severity: Severity): SignalSeverity {
  return severity === 'NONE' ? 'INFO' : severity;
}

const ANOMALY_EVENT_TYPE: Readonly<Record<AnomalyType, EventType>> = {
  CERT_CHANGED: 'SUSPICIOUS_UPDATE',
  VERSION_ROLLBACK: 'SUSPICIOUS_UPDATE',
  INSTALLER_CHANGED: 'SUSPICIOUS_INSTALL',
  NEW_SYSTEM_APP: 'SUSPICIOUS_INSTALL',
  HIGH_RISK_PERMISSION_ADDED: 'CAPABILITY_ESCALATION',
  EXPORTED_SURFACE_INCREASED: 'CAPABILITY_ESCALATION',
  PERMISSION_SET_CHANGED: 'CAPABILITY_ESCALATION',
  VERSION_CHANGED: 'OTHER',
  PARTITION_CHANGED: 'DEVICE_COMPROMISE',
};

const ANOMALY_SIGNAL_TYPE: Readonly<Record<AnomalyType, SignalType>> = {
  CERT_CHANGED: 'CERT_CHANGE',
  VERSION_ROLLBACK: 'VERSION_ROLLBACK',
  INSTALLER_CHANGED: 'INSTALLER_CHANGE',
  NEW_SYSTEM_APP: 'NEW_APP_INSTALLED',
  HIGH_RISK_PERMISSION_ADDED: 'HIGH_RISK_PERM_ADDED',
  EXPORTED_SURFACE_INCREASED: 'EXPORTED_SURFACE_CHANGE',
  PERMISSION_SET_CHANGED: 'PERMISSION_SET_CHANGE',
  VERSION_CHANGED: 'VERSION_CHANGE',
  PARTITION_CHANGED: 'PARTITION_CHANGE',
};

export interface SignalInput {
  source: SignalSource;
  type: SignalType;
  severity: SignalSeverity;
  packageName: string | null;
  summary: string;
  details?: Record<string, string>;
}

export function createSignal(input: SignalInput, now: number): SecuritySignal {
  return {
    id: deterministicId('signal', `${input.packageName ?? 'device'}_${input.type}_${input.summary}_${now}`),
    timestamp: now,
    source: input.source,
    type: input.type,
    severity: input.severity,
    packageName: input.packageName,
    summary: input.summary,
    details: input.details ?? {},
  };
}

function eventFrom(
  id: string,
  type: EventType,
  signals: SecuritySignal[],
  summary: string,
  metadata: Record<string, string>,
  now: number,
): SecurityEvent {
  const [first] = signals;
  return {
    id,
    startTime: now,
    endTime: now,
    source: first?.source ?? 'TRUST_ENGINE',
    type,
    severity: strongestSeverity(signals),
    packageName: first?.packageName ?? null,
    summary,
    signals,
    metadata,
    isPromoted: false,
  };
}

export function strongestSeverity(signals: readonly SecuritySignal[]): SignalSeverity {
  let best = 0;
  for (const s of signals) best = Math.max(best, SIGNAL_SEVERITY_ORDER.indexOf(s.severity));
  return SIGNAL_SEVERITY_ORDER[best] ?? 'INFO';
}

/** One event per anomaly, keyed by package and anomaly type. */
export function baselineEvents(comparison: BaselineComparison, now: number): SecurityEvent[] {
  return comparison.anomalies.map((anomaly) => {
    const signal = createSignal(
      {
        source: 'BASELINE',
        type: ANOMALY_SIGNAL_TYPE[anomaly.type],
        severity: anomaly.severity,
        packageName: comparison.packageName,
        summary: anomaly.description,
        details: anomaly.details === null ? {} : { details: anomaly.details },
      },
      now,
    );
    return eventFrom(
      deterministicId('baseline', `${comparison.packageName}_${anomaly.type}`),
      ANOMALY_EVENT_TYPE[anomaly.type],
      [signal],
      anomaly.description,
      {
        anomalyType: anomaly.type,
        details: anomaly.details ?? '',
        scanCount: String(comparison.scanCount),
        isFirstScan: String(comparison.isFirstScan),
      },
      now,
    );
  });
}

export function specialAccessEvent(snapshot: SpecialAccessSnapshot, now: number): SecurityEvent | null {
  if (!hasAnySpecialAccess(snapshot)) return null;
  const labels = activeSpecialAccessLabels(snapshot);
  const summary = `Special access: ${labels.join(', ')}`;
  const signal = createSignal(
    {
      source: 'SPECIAL_ACCESS',
      type: 'SPECIAL_ACCESS_ENABLED',
      severity: 'MEDIUM',
      packageName: snapshot.packageName,
      summary,
    },
    now,
  );
  return eventFrom(
    deterministicId('special', snapshot.packageName),
    'SPECIAL_ACCESS_GRANT',
    [signal],
    summary,
    {
      accessibility: String(snapshot.accessibilityEnabled),
      notificationListener: String(snapshot.notificationListenerEnabled),
      deviceAdmin: String(snapshot.deviceAdminEnabled),
      overlay: String(snapshot.overlayEnabled),
      defaultSms: String(snapshot.isDefaultSms),
      defaultDialer: String(snapshot.isDefaultDialer),
      batteryOptIgnored: String(snapshot.batteryOptimizationIgnored),
      activeCount: String(labels.length),
    },
    now,
  );
}

export function comboEventType(required: readonly CapabilityCluster[]): EventType {
  if (required.includes('INSTALL_PACKAGES')) return 'DROPPER_PATTERN';
  if (required.includes('OVERLAY')) return 'OVERLAY_ATTACK_PATTERN';
  if (required.includes('NOTIFICATION_LISTENER') || required.includes('CALL_LOG')) return 'STALKERWARE_PATTERN';
  if (required.includes('VPN')) return 'SUSPICIOUS_VPN';
  return 'CAPABILITY_ESCALATION';
}

/** Matched combo names are looked up in the catalog; unknown names are skipped. */
export function comboEvents(
  packageName: string,
  comboNames: readonly string[],
  now: number,
  catalog: readonly DangerousCombo[] = DANGEROUS_COMBOS,
): SecurityEvent[] {
  const events: SecurityEvent[] = [];
  for (const name of comboNames) {
    const combo = catalog.find((c) => c.name === name);
    if (combo === undefined) continue;
    const signal = createSignal(
      {
        source: 'TRUST_ENGINE',
        type: 'COMBO_DETECTED',
        severity: toSignalSeverity(combo.severity),
        packageName,
        summary: combo.name,
        details: { clusters: combo.requiredClusters.join(',') },
      },
      now,
    );
    events.push(
      eventFrom(
        deterministicId('combo', `${packageName}_${combo.name}`),
        comboEventType(combo.requiredClusters),
        [signal],
        combo.name,
        { combo: combo.name, clusters: combo.requiredClusters.join(',') },
        now,
      ),
    );
  }
  return events;
}

function configEventType(type: SignalType): EventType {
  switch (type) {
    case 'USER_CA_CERT_ADDED':
      return 'CA_CERT_INSTALLED';
    case 'VPN_STATE_CHANGED':
      return 'SUSPICIOUS_VPN';
    default:
      return 'CONFIG_TAMPER';
  }
}

/** Config signals become one event each; INFO and LOW changes are not worth an event. */
export function configEvents(signals: readonly SecuritySignal[], now: number): SecurityEvent[] {
  return signals
    .filter((s) => s.severity !== 'INFO' && s.severity !== 'LOW')
    .map((s) =>
      eventFrom(
        deterministicId('config', `${s.type}_${s.details.new ?? s.details.old ?? ''}`),
        configEventType(s.type),
        [s],
        s.summary,
        { ...s.details },
        now,
      ),
    );
}
