import { describe, it, expect } from 'vitest';
import {
  generateActions,
  generateHypotheses,
  resolve,
  resolveAll,
} from '../src/incidents/root-cause.js';
import { deterministicId } from '../src/incidents/signals.js';
import type { EventType } from '../src/incidents/types.js';
import type { TimelineResult } from '../src/timeline/types.js';
import { makeConfig, makeEvent, makeFeatureVector, makeSignal, TEST_NOW } from './helpers.js';

const lowTrustSideloaded = makeFeatureVector({
  identity: { trustScore: 20, trustLevel: 'LOW', installerType: 'SIDELOADED', installerPackage: 'com.example.fileshare' },
});

function timeline(overrides: Partial<TimelineResult> = {}): TimelineResult {
  return {
    packageName: 'com.example.app',
    score: 0.6,
    phase: 'SHORT_TERM',
    signals: [],
    installAge: 1000,
    isFreshInstall: true,
    isDropperCandidate: true,
    isHighConfidenceDropper: true,
    ...overrides,
  };
}

describe('generateHypotheses', () => {
  it('raises stalkerware confidence for a low-trust sideload', () => {
    const [top] = generateHypotheses(makeEvent({ type: 'STALKERWARE_PATTERN' }), { appKnowledge: lowTrustSideloaded });
    expect(top?.name).toBe('Stalkerware or monitoring app');
    expect(top?.confidence).toBeCloseTo(0.95);
    expect(top?.supportingEvidence).toEqual([
      'Accessibility combined with notification access',
      'Sideloaded install',
      'Low trust (20)',
    ]);
    expect(top?.mitreTechniques).toEqual(['T1417', 'T1513']);
  });

  it('lowers stalkerware confidence for a trusted app', () => {
    const app = makeFeatureVector({ identity: { trustScore: 80, trustLevel: 'HIGH' } });
    const [top] = generateHypotheses(makeEvent({ type: 'STALKERWARE_PATTERN' }), { appKnowledge: app });
    expect(top?.confidence).toBeCloseTo(0.55);
    expect(top?.contradictingEvidence).toEqual(['Higher trust (80)']);
  });

  it('orders update hypotheses by confidence', () => {
    const event = makeEvent({ type: 'SUSPICIOUS_UPDATE' });
    const rollback = makeFeatureVector({ change: { isVersionRollback: true } });
    expect(generateHypotheses(event, { appKnowledge: rollback }).map((h) => h.name)).toEqual([
      'Supply-chain compromise',
      'Legitimate update',
    ]);

    const trusted = makeFeatureVector({ identity: { trustScore: 80, trustLevel: 'HIGH' } });
    const ordered = generateHypotheses(event, { appKnowledge: trusted });
    expect(ordered.map((h) => h.name)).toEqual(['Legitimate update', 'Supply-chain compromise']);
    expect(ordered[0]?.confidence).toBeCloseTo(0.7);
  });

  it('supports interception when a VPN is active with a new CA', () => {
    const hypotheses = generateHypotheses(makeEvent({ type: 'CA_CERT_INSTALLED', packageName: null }), {
      configSnapshot: makeConfig({ vpnActive: true }),
    });
    expect(hypotheses.map((h) => [h.name, Number(h.confidence.toFixed(2))])).toEqual([
      ['Man-in-the-middle interception', 0.7],
      ['Corporate or MDM configuration', 0.4],
    ]);
  });

  it('boosts every hypothesis when the same app has correlated events', () => {
    const event = makeEvent({ type: 'OTHER', summary: 'Something odd' });
    const twoMore = [makeEvent({ id: 'e2' }), makeEvent({ id: 'e3' })];
    const [boosted] = generateHypotheses(event, { recentEvents: twoMore });
    expect(boosted?.name).toBe('Security anomaly');
    expect(boosted?.description).toBe('Something odd');
    expect(boosted?.confidence).toBeCloseTo(0.4);
    expect(boosted?.supportingEvidence).toEqual([
      'Detected automatically',
      'Several security events for this app in a short time',
    ]);

    const [single] = generateHypotheses(event, { recentEvents: [makeEvent({ id: 'e2' })] });
    expect(single?.confidence).toBeCloseTo(0.3);

    const otherApp = [makeEvent({ id: 'e2', packageName: 'x' }), makeEvent({ id: 'e3', packageName: 'x' })];
    expect(generateHypotheses(event, { recentEvents: otherApp })[0]?.confidence).toBeCloseTo(0.3);
  });

  it('boosts dropper-like hypotheses from the install timeline', () => {
    const event = makeEvent({ type: 'DROPPER_PATTERN' });
    const app = makeFeatureVector();
    const [high] = generateHypotheses(event, { appKnowledge: app, timeline: timeline() });
    expect(high?.confidence).toBeCloseTo(0.75);
    expect(high?.supportingEvidence).toContain('Install timeline score 0.60');

    const candidate = timeline({ score: 0.35, isHighConfidenceDropper: false });
    expect(generateHypotheses(event, { appKnowledge: app, timeline: candidate })[0]?.confidence).toBeCloseTo(0.7);

    const quiet = timeline({ score: 0.1, isDropperCandidate: false, isHighConfidenceDropper: false });
    expect(generateHypotheses(event, { appKnowledge: app, timeline: quiet })[0]?.confidence).toBeCloseTo(0.6);
  });

  it('leaves other hypotheses alone when the timeline is suspicious', () => {
    const [supply] = generateHypotheses(makeEvent({ type: 'SUSPICIOUS_UPDATE' }), { timeline: timeline() });
    expect(supply?.confidence).toBeCloseTo(0.4);
  });

  it('saturates a staged payload at full confidence', () => {
    const app = makeFeatureVector({
      identity: { trustScore: 20, trustLevel: 'LOW', installerType: 'SIDELOADED', isNewApp: true },
      capability: { activeHighRiskClusters: ['INSTALL_PACKAGES'] },
    });
    const hypotheses = generateHypotheses(makeEvent({ type: 'STAGED_PAYLOAD' }), { appKnowledge: app });
    expect(hypotheses.map((h) => h.name)).toEqual(['Staged payload dropper', 'Dropper installing further malware']);
    expect(hypotheses[0]?.confidence).toBe(1);
    expect(hypotheses[1]?.confidence).toBeCloseTo(0.95);
  });

  it('counts network signals for loader behaviour', () => {
    const event = makeEvent({
      type: 'LOADER_BEHAVIOR',
      signals: [makeSignal({ type: 'DYNAMIC_CODE_LOADING' }), makeSignal({ type: 'NETWORK_AFTER_INSTALL' })],
    });
    const [loader] = generateHypotheses(event, { appKnowledge: makeFeatureVector() });
    expect(loader?.name).toBe('Loader downloading code at runtime');
    expect(loader?.confidence).toBeCloseTo(0.65);
  });

  it('keeps confidence within 0 and 1 for every event type', () => {
    const types: EventType[] = [
      'SUSPICIOUS_UPDATE',
      'SUSPICIOUS_INSTALL',
      'CAPABILITY_ESCALATION',
      'SPECIAL_ACCESS_GRANT',
      'STALKERWARE_PATTERN',
      'DROPPER_PATTERN',
      'OVERLAY_ATTACK_PATTERN',
      'STAGED_PAYLOAD',
      'LOADER_BEHAVIOR',
      'CONFIG_TAMPER',
      'CA_CERT_INSTALLED',
      'SUSPICIOUS_VPN',
      'DEVICE_COMPROMISE',
      'OTHER',
    ];
    const apps = [
      null,
      lowTrustSideloaded,
      makeFeatureVector({
        identity: { trustScore: 100, trustLevel: 'HIGH', isNewApp: true },
        capability: { activeHighRiskClusters: ['OVERLAY', 'ACCESSIBILITY', 'INSTALL_PACKAGES'] },
      }),
    ];
    const recent = [makeEvent({ id: 'a' }), makeEvent({ id: 'b' }), makeEvent({ id: 'c' })];
    for (const type of types) {
      for (const app of apps) {
        for (const hypothesis of generateHypotheses(makeEvent({ type }), {
          appKnowledge: app,
          recentEvents: recent,
          timeline: timeline(),
        })) {
          expect(hypothesis.confidence).toBeGreaterThanOrEqual(0);
          expect(hypothesis.confidence).toBeLessThanOrEqual(1);
        }
      }
    }
  });
});

describe('generateActions', () => {
  it('recommends uninstalling above 0.7 confidence', () => {
    const event = makeEvent({ type: 'STALKERWARE_PATTERN' });
    const [top] = generateHypotheses(event, { appKnowledge: lowTrustSideloaded });
    const actions = generateActions(event, lowTrustSideloaded, top ?? null);
    expect(actions.map((a) => [a.priority, a.type, a.targetPackage])).toEqual([
      [1, 'UNINSTALL', 'com.example.app'],
      [2, 'MONITOR', 'com.example.app'],
    ]);
  });

  it('does not recommend uninstalling at exactly 0.7', () => {
    const event = makeEvent({ type: 'STALKERWARE_PATTERN' });
    const [top] = generateHypotheses(event);
    expect(top?.confidence).toBe(0.7);
    expect(generateActions(event, null, top ?? null).map((a) => a.type)).toEqual(['MONITOR']);
  });

  it('asks to revoke special access that is on', () => {
    const app = makeFeatureVector({ specialAccess: { accessibilityEnabled: true } });
    const event = makeEvent({ type: 'SPECIAL_ACCESS_GRANT' });
    const actions = generateActions(event, app, generateHypotheses(event, { appKnowledge: app })[0] ?? null);
    expect(actions.map((a) => [a.priority, a.type])).toEqual([
      [2, 'REVOKE_SPECIAL_ACCESS'],
      [2, 'MONITOR'],
    ]);
  });

  it('points device-wide settings changes at the settings', () => {
    const event = makeEvent({ type: 'CONFIG_TAMPER', packageName: null });
    const actions = generateActions(event, null, generateHypotheses(event)[0] ?? null);
    expect(actions.map((a) => [a.priority, a.type, a.targetPackage])).toEqual([
      [1, 'CHECK_SETTINGS', null],
      [2, 'MONITOR', null],
    ]);
  });
});

describe('resolve', () => {
  it('builds an open incident titled after the top hypothesis', () => {
    const event = makeEvent({ id: 'event-9', type: 'STALKERWARE_PATTERN', severity: 'CRITICAL', endTime: TEST_NOW + 7 });
    const incident = resolve(event, { appKnowledge: lowTrustSideloaded });
    expect(incident).toMatchObject({
      id: deterministicId('incident', 'event-9'),
      createdAt: TEST_NOW + 7,
      updatedAt: TEST_NOW + 7,
      severity: 'CRITICAL',
      status: 'OPEN',
      title: 'Stalkerware or monitoring app',
      summary: 'The app has the capabilities typical of surveillance software',
      packageName: 'com.example.app',
      affectedPackages: ['com.example.app'],
    });
    expect(incident.events).toEqual([event]);
    expect(incident.recommendedActions[0]?.type).toBe('UNINSTALL');
  });

  it('is deterministic', () => {
    const event = makeEvent({ type: 'DROPPER_PATTERN' });
    const ctx = { appKnowledge: lowTrustSideloaded, timeline: timeline(), now: TEST_NOW };
    expect(resolve(event, ctx)).toEqual(resolve(event, ctx));
  });

  it('uses the supplied time', () => {
    expect(resolve(makeEvent(), { now: 42 }).createdAt).toBe(42);
  });
});

describe('resolveAll', () => {
  it('resolves every event with the knowledge of its own package', () => {
    const events = [
      makeEvent({ id: 'a1', packageName: 'com.example.a', type: 'STALKERWARE_PATTERN' }),
      makeEvent({ id: 'device', packageName: null, type: 'CONFIG_TAMPER' }),
      makeEvent({ id: 'a2', packageName: 'com.example.a', type: 'OTHER' }),
      makeEvent({ id: 'b1', packageName: 'com.example.b', type: 'STALKERWARE_PATTERN' }),
    ];
    const knowledge = new Map([['com.example.a', makeFeatureVector({ packageName: 'com.example.a', identity: { trustScore: 20, trustLevel: 'LOW' } })]]);
    const incidents = resolveAll(events, { appKnowledge: knowledge, now: TEST_NOW });

    expect(incidents.map((i) => i.events[0]?.id)).toEqual(['a1', 'a2', 'device', 'b1']);
    expect(incidents[0]?.hypotheses[0]?.confidence).toBeCloseTo(0.8);
    expect(incidents[1]?.hypotheses[0]?.confidence).toBeCloseTo(0.3);
    expect(incidents[2]?.affectedPackages).toEqual([]);
    expect(incidents[3]?.hypotheses[0]?.confidence).toBeCloseTo(0.7);
  });
});
