import type { CapabilityCluster } from '../catalog/clusters.js';
import type { AppFeatureVector, SecurityEvent, SignalType } from '../incidents/types.js';
import type { TimelinePhase, TimelineResult, TimelineSignal } from './types.js';

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;

export const IMMEDIATE_WINDOW_MS = 10 * MINUTE;
export const SHORT_WINDOW_MS = 6 * HOUR;
export const MEDIUM_WINDOW_MS = 48 * HOUR;
export const FRESH_INSTALL_THRESHOLD_MS = 48 * HOUR;

export const TIMELINE_WEIGHTS = {
  freshInstall: 0.1,
  immediateNetwork: 0.15,
  immediateSms: 0.2,
  shortAccessibility: 0.25,
  shortOverlay: 0.2,
  mediumEscalation: 0.15,
  bootPersistence: 0.1,
  dynamicCodeLoading: 0.15,
  installerPermission: 0.15,
  lowTrust: 0.15,
  sideload: 0.1,
} as const;

export const DROPPER_CANDIDATE_SCORE = 0.3;
export const HIGH_CONFIDENCE_DROPPER_SCORE = 0.55;

export function formatAge(ageMs: number): string {
  if (ageMs < MINUTE) return `${Math.floor(ageMs / 1000)} s`;
  if (ageMs < HOUR) return `${Math.floor(ageMs / MINUTE)} min`;
  if (ageMs < 24 * HOUR) return `${Math.floor(ageMs / HOUR)} h`;
  return `${Math.floor(ageMs / (24 * HOUR))} d`;
}

function phaseFor(installAge: number, isFresh: boolean): TimelinePhase {
  if (!isFresh) return 'ESTABLISHED';
  if (installAge <= IMMEDIATE_WINDOW_MS) return 'IMMEDIATE';
  if (installAge <= SHORT_WINDOW_MS) return 'SHORT_TERM';
  if (installAge <= MEDIUM_WINDOW_MS) return 'MEDIUM_TERM';
  return 'NOT_APPLICABLE';
}

function hasCluster(app: AppFeatureVector, cluster: CapabilityCluster): boolean {
  return app.capability.activeHighRiskClusters.includes(cluster);
}

function hasEventInWindow(events: readonly SecurityEvent[], installTime: number, windowMs: number): boolean {
  return events.some((e) => {
    const delta = e.startTime - installTime;
    return delta >= 0 && delta <= windowMs;
  });
}

function result(
  app: AppFeatureVector,
  installAge: number,
  isFresh: boolean,
  phase: TimelinePhase,
  signals: TimelineSignal[],
): TimelineResult {
  const raw = signals.reduce((sum, s) => sum + s.weight, 0);
  const score = Math.min(1, Math.max(0, raw));
  return {
    packageName: app.packageName,
    score,
    phase,
    signals,
    installAge,
    isFreshInstall: isFresh,
    isDropperCandidate: score >= DROPPER_CANDIDATE_SCORE,
    isHighConfidenceDropper: score >= HIGH_CONFIDENCE_DROPPER_SCORE,
  };
}

/**
 * Scores how closely the first 48 hours after an install follow a dropper
 * pattern. Apps older than that score 0 and are not analysed further.
 */
export function analyze(
  app: AppFeatureVector,
  recentEvents: readonly SecurityEvent[],
  now: number,
): TimelineResult {
  const installTime = app.change.lastUpdateAt ?? app.timestamp;
  const installAge = now - installTime;
  const isFresh = installAge >= 1 && installAge <= FRESH_INSTALL_THRESHOLD_MS;
  const phase = phaseFor(installAge, isFresh);
  if (!isFresh) return result(app, installAge, false, phase, []);

  const signals: TimelineSignal[] = [
    {
      type: 'FRESH_INSTALL',
      description: `Installed ${formatAge(installAge)} ago`,
      weight: TIMELINE_WEIGHTS.freshInstall,
      timeAfterInstallMs: installAge,
    },
  ];

  const appEvents = recentEvents.filter((e) => e.packageName === app.packageName);
  const signalTypes = new Set<SignalType>(appEvents.flatMap((e) => e.signals.map((s) => s.type)));

  if (installAge <= IMMEDIATE_WINDOW_MS || hasEventInWindow(appEvents, installTime, IMMEDIATE_WINDOW_MS)) {
    if (signalTypes.has('NETWORK_BURST_ANOMALY') || signalTypes.has('NETWORK_AFTER_INSTALL')) {
      signals.push({
        type: 'IMMEDIATE_NETWORK_BURST',
        description: 'Network traffic right after install',
        weight: TIMELINE_WEIGHTS.immediateNetwork,
        timeAfterInstallMs: installAge,
      });
    }
    if (hasCluster(app, 'SMS')) {
      signals.push({
        type: 'IMMEDIATE_SMS_ACCESS',
        description: 'SMS access right after install',
        weight: TIMELINE_WEIGHTS.immediateSms,
        timeAfterInstallMs: installAge,
      });
    }
  }

  if (installAge <= SHORT_WINDOW_MS || hasEventInWindow(appEvents, installTime, SHORT_WINDOW_MS)) {
    if (
      hasCluster(app, 'ACCESSIBILITY') ||
      app.specialAccess.accessibilityEnabled ||
      signalTypes.has('SPECIAL_ACCESS_ENABLED') ||
      signalTypes.has('UNKNOWN_ACCESSIBILITY_SERVICE')
    ) {
      signals.push({
        type: 'SHORT_TERM_ACCESSIBILITY',
        description: `Accessibility enabled within ${formatAge(SHORT_WINDOW_MS)} of install`,
        weight: TIMELINE_WEIGHTS.shortAccessibility,
        timeAfterInstallMs: installAge,
      });
    }
    if (hasCluster(app, 'OVERLAY')) {
      signals.push({
        type: 'SHORT_TERM_OVERLAY',
        description: `Overlay permission within ${formatAge(SHORT_WINDOW_MS)} of install`,
        weight: TIMELINE_WEIGHTS.shortOverlay,
        timeAfterInstallMs: installAge,
      });
    }
  }

  if (signalTypes.has('HIGH_RISK_PERM_ADDED') || signalTypes.has('POST_INSTALL_PERMISSION_ESCALATION')) {
    signals.push({
      type: 'MEDIUM_TERM_ESCALATION',
      description: `Permission escalation within ${formatAge(MEDIUM_WINDOW_MS)} of install`,
      weight: TIMELINE_WEIGHTS.mediumEscalation,
      timeAfterInstallMs: installAge,
    });
  }

  if (signalTypes.has('BOOT_PERSISTENCE') || (app.surface.exportedReceiverCount > 0 && app.identity.isNewApp)) {
    signals.push({
      type: 'BOOT_PERSISTENCE',
      description: 'Registers a boot receiver',
      weight: TIMELINE_WEIGHTS.bootPersistence,
      timeAfterInstallMs: null,
    });
  }

  if (signalTypes.has('DYNAMIC_CODE_LOADING')) {
    signals.push({
      type: 'DYNAMIC_CODE_LOADING',
      description: 'Dynamic code loading detected',
      weight: TIMELINE_WEIGHTS.dynamicCodeLoading,
      timeAfterInstallMs: null,
    });
  }

  if (hasCluster(app, 'INSTALL_PACKAGES')) {
    signals.push({
      type: 'FRESH_INSTALL_WITH_INSTALLER_PERM',
      description: 'Fresh install that can install other apps',
      weight: TIMELINE_WEIGHTS.installerPermission,
      timeAfterInstallMs: installAge,
    });
  }

  if (app.identity.trustLevel === 'LOW' || app.identity.trustLevel === 'ANOMALOUS') {
    signals.push({
      type: 'LOW_TRUST_AMPLIFIER',
      description: `Low trust (${app.identity.trustScore})`,
      weight: TIMELINE_WEIGHTS.lowTrust,
      timeAfterInstallMs: null,
    });
  }

  if (app.identity.installerType === 'SIDELOADED') {
    signals.push({
      type: 'SIDELOAD_AMPLIFIER',
      description: 'Installed outside an app store',
      weight: TIMELINE_WEIGHTS.sideload,
      timeAfterInstallMs: null,
    });
  }

  return result(app, installAge, true, phase, signals);
}

/** Drops zero scores; highest score first. */
export function analyzeAll(
  apps: readonly AppFeatureVector[],
  recentEvents: readonly SecurityEvent[],
  now: number,
): TimelineResult[] {
  return apps
    .map((app) => analyze(app, recentEvents, now))
    .filter((r) => r.score > 0)
    .sort((a, b) => b.score - a.score);
}
