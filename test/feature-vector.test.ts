import { describe, it, expect } from 'vitest';
import type { BaselineComparison } from '../src/baseline/types.js';
import {
  buildFeatureVector,
  hasRecentChanges,
  hasSuspiciousProfile,
  isHighPriorityTarget,
  isNewApp,
  shouldMonitor,
} from '../src/incidents/feature-vector.js';
import { evaluate } from '../src/risk/evaluate.js';
import { HOUR, makeApp, makeEvidence, makeFeatureVector, makeRiskInput, P, TEST_NOW } from './helpers.js';

function comparison(overrides: Partial<BaselineComparison> = {}): BaselineComparison {
  return { packageName: 'com.example.app', status: 'NEW', anomalies: [], isFirstScan: false, scanCount: 0, ...overrides };
}

describe('isNewApp', () => {
  it('is only true for apps that appear after the first scan', () => {
    expect(isNewApp(comparison())).toBe(true);
    expect(isNewApp(comparison({ isFirstScan: true }))).toBe(false);
    expect(isNewApp(comparison({ status: 'UNCHANGED' }))).toBe(false);
  });
});

describe('buildFeatureVector', () => {
  it('collects identity, change, capability and verdict features', () => {
    const granted = [`${P}READ_SMS`, `${P}CAMERA`, `${P}ACCESS_BACKGROUND_LOCATION`];
    const app = makeApp({
      grantedPermissions: granted,
      firstInstallTime: TEST_NOW - HOUR,
      versionCode: 3,
      nativeLibFindings: [{ name: 'libmedia.so' }],
    });
    const evidence = makeEvidence();
    const verdict = evaluate(makeRiskInput({ grantedPermissions: granted }));
    const vector = buildFeatureVector({
      app,
      evidence,
      comparison: comparison(),
      verdict,
      category: 'OTHER',
      now: TEST_NOW,
    });

    expect(vector.identity).toMatchObject({ trustScore: 50, installerType: 'PLAY_STORE', isNewApp: true });
    expect(vector.change).toEqual({
      baselineStatus: 'NEW',
      isFirstScan: false,
      anomalies: [],
      lastUpdateAt: TEST_NOW - HOUR,
      versionCode: 3,
      versionName: null,
      isVersionRollback: false,
    });
    expect(vector.capability).toEqual({
      activeHighRiskClusters: ['SMS'],
      unexpectedClusters: ['SMS'],
      dangerousPermissionCount: 3,
      highRiskPermissions: [`${P}ACCESS_BACKGROUND_LOCATION`, `${P}READ_SMS`],
      privacyCapabilities: ['camera'],
      matchedCombos: [],
      appCategory: 'OTHER',
    });
    expect(vector.surface.nativeLibCount).toBe(1);
    expect(vector.surface.hasSuspiciousNativeLibs).toBe(false);
    expect(vector.specialAccess.packageName).toBe('com.example.app');
    expect(vector.verdict).toEqual({
      effectiveRisk: 'INFO',
      riskScore: 0,
      hardFindingCount: 0,
      softFindingCount: 0,
      topReasons: [],
    });
  });

  it('marks rollbacks and prefers the last update time', () => {
    const vector = buildFeatureVector({
      app: makeApp({ firstInstallTime: 1, lastUpdateTime: 2 }),
      evidence: makeEvidence(),
      comparison: comparison({
        status: 'CHANGED',
        anomalies: [{ type: 'VERSION_ROLLBACK', severity: 'HIGH', description: 'rollback', details: null }],
      }),
      verdict: evaluate(makeRiskInput()),
      category: 'OTHER',
      now: TEST_NOW,
    });
    expect(vector.change.lastUpdateAt).toBe(2);
    expect(vector.change.isVersionRollback).toBe(true);
    expect(vector.change.anomalies).toEqual(['VERSION_ROLLBACK']);
  });
});

describe('feature vector predicates', () => {
  it('treats low trust with special access as a high priority target', () => {
    const vector = makeFeatureVector({
      identity: { trustScore: 30, trustLevel: 'LOW' },
      specialAccess: { overlayEnabled: true },
    });
    expect(isHighPriorityTarget(vector)).toBe(true);
    expect(shouldMonitor(vector)).toBe(true);
    expect(isHighPriorityTarget(makeFeatureVector({ identity: { trustScore: 30 } }))).toBe(false);
  });

  it('sees recent changes in anomalies or a new status', () => {
    expect(hasRecentChanges(makeFeatureVector())).toBe(false);
    expect(hasRecentChanges(makeFeatureVector({ change: { baselineStatus: 'NEW' } }))).toBe(true);
    expect(hasRecentChanges(makeFeatureVector({ change: { anomalies: ['CERT_CHANGED'] } }))).toBe(true);
  });

  it('needs an unexpected cluster plus a sideload or special access for a suspicious profile', () => {
    const unexpected = { unexpectedClusters: ['SMS' as const] };
    expect(hasSuspiciousProfile(makeFeatureVector({ capability: unexpected }))).toBe(false);
    expect(
      hasSuspiciousProfile(makeFeatureVector({ capability: unexpected, identity: { installerType: 'SIDELOADED' } })),
    ).toBe(true);
  });

  it('monitors apps with attention-worthy verdicts', () => {
    expect(shouldMonitor(makeFeatureVector())).toBe(false);
    expect(shouldMonitor(makeFeatureVector({ verdict: { effectiveRisk: 'NEEDS_ATTENTION' } }))).toBe(true);
  });
});
