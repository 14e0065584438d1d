import { describe, it, expect } from 'vitest';
import type { BaselineComparison } from '../src/baseline/types.js';
import {
  baselineEvents,
  comboEvents,
  comboEventType,
  configEvents,
  createSignal,
  deterministicId,
  specialAccessEvent,
  strongestSeverity,
  toSignalSeverity,
} from '../src/incidents/signals.js';
import { InMemoryEventStore } from '../src/incidents/event-store.js';
import {
  canTransition,
  IncidentTransitionError,
  isTerminal,
  transitionIncident,
} from '../src/incidents/lifecycle.js';
import type { SecurityIncident } from '../src/incidents/types.js';
import { HOUR, makeEvent, makeSignal, makeSpecialAccess, TEST_NOW } from './helpers.js';

describe('signals', () => {
  it('derives stable ids from their inputs', () => {
    expect(deterministicId('baseline', 'com.example.app_CERT_CHANGED')).toBe(
      deterministicId('baseline', 'com.example.app_CERT_CHANGED'),
    );
    expect(deterministicId('baseline', 'a')).not.toBe(deterministicId('combo', 'a'));
    expect(deterministicId('x', 'y')).toMatch(/^[0-9a-f]{64}$/);
  });

  it('gives two signals with different summaries different ids', () => {
    const base = { source: 'BASELINE' as const, type: 'CERT_CHANGE' as const, severity: 'HIGH' as const, packageName: 'p' };
    const a = createSignal({ ...base, summary: 'one' }, TEST_NOW);
    const b = createSignal({ ...base, summary: 'two' }, TEST_NOW);
    expect(a.id).not.toBe(b.id);
    expect(a.details).toEqual({});
  });

  it('maps finding severity onto signal severity', () => {
    expect(toSignalSeverity('NONE')).toBe('INFO');
    expect(toSignalSeverity('HIGH')).toBe('HIGH');
  });

  it('picks the strongest severity, INFO for none', () => {
    expect(strongestSeverity([makeSignal({ severity: 'LOW' }), makeSignal({ severity: 'CRITICAL' })])).toBe('CRITICAL');
    expect(strongestSeverity([])).toBe('INFO');
  });
});

describe('baselineEvents', () => {
  const comparison: BaselineComparison = {
    packageName: 'com.example.app',
    status: 'CHANGED',
    isFirstScan: false,
    scanCount: 3,
    anomalies: [
      { type: 'CERT_CHANGED', severity: 'CRITICAL', description: 'Signing certificate changed', details: 'previous A current B' },
      { type: 'VERSION_CHANGED', severity: 'LOW', description: 'Version changed: 1 -> 2', details: null },
    ],
  };

  it('creates one event per anomaly', () => {
    const events = baselineEvents(comparison, TEST_NOW);
    expect(events.map((e) => [e.type, e.severity, e.source])).toEqual([
      ['SUSPICIOUS_UPDATE', 'CRITICAL', 'BASELINE'],
      ['OTHER', 'LOW', 'BASELINE'],
    ]);
    expect(events[0]).toMatchObject({
      id: deterministicId('baseline', 'com.example.app_CERT_CHANGED'),
      packageName: 'com.example.app',
      summary: 'Signing certificate changed',
      startTime: TEST_NOW,
      endTime: TEST_NOW,
      isPromoted: false,
      metadata: {
        anomalyType: 'CERT_CHANGED',
        details: 'previous A current B',
        scanCount: '3',
        isFirstScan: 'false',
      },
    });
    expect(events[0]?.signals[0]).toMatchObject({ type: 'CERT_CHANGE', details: { details: 'previous A current B' } });
    expect(events[1]?.signals[0]?.details).toEqual({});
  });

  it('keeps the event id across scans', () => {
    const later = baselineEvents(comparison, TEST_NOW + HOUR);
    expect(later[0]?.id).toBe(baselineEvents(comparison, TEST_NOW)[0]?.id);
  });
});

describe('specialAccessEvent', () => {
  it('returns null when nothing is enabled', () => {
    expect(specialAccessEvent(makeSpecialAccess('com.example.app'), TEST_NOW)).toBeNull();
  });

  it('summarises the enabled accesses', () => {
    const event = specialAccessEvent(
      makeSpecialAccess('com.example.app', { accessibilityEnabled: true, isDefaultSms: true }),
      TEST_NOW,
    );
    expect(event).toMatchObject({
      type: 'SPECIAL_ACCESS_GRANT',
      severity: 'MEDIUM',
      source: 'SPECIAL_ACCESS',
      summary: 'Special access: accessibility, default SMS',
    });
    expect(event?.metadata.activeCount).toBe('2');
    expect(event?.metadata.defaultSms).toBe('true');
    expect(event?.metadata.overlay).toBe('false');
  });
});

describe('comboEvents', () => {
  it('maps combos to event types by their clusters', () => {
    expect(comboEventType(['ACCESSIBILITY', 'INSTALL_PACKAGES'])).toBe('DROPPER_PATTERN');
    expect(comboEventType(['OVERLAY', 'SMS'])).toBe('OVERLAY_ATTACK_PATTERN');
    expect(comboEventType(['SMS', 'CALL_LOG'])).toBe('STALKERWARE_PATTERN');
    expect(comboEventType(['VPN'])).toBe('SUSPICIOUS_VPN');
    expect(comboEventType(['SMS'])).toBe('CAPABILITY_ESCALATION');
  });

  it('skips names missing from the catalog', () => {
    const events = comboEvents('com.example.app', ['Sideloaded VPN', 'Not a combo'], TEST_NOW);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({
      type: 'SUSPICIOUS_VPN',
      severity: 'HIGH',
      source: 'TRUST_ENGINE',
      summary: 'Sideloaded VPN',
      metadata: { combo: 'Sideloaded VPN', clusters: 'VPN' },
    });
  });
});

describe('configEvents', () => {
  it('drops LOW and INFO signals and maps the rest', () => {
    const signals = [
      makeSignal({ source: 'CONFIG_BASELINE', type: 'USER_CA_CERT_ADDED', severity: 'HIGH', packageName: null, details: { new: 'CN=Test CA' } }),
      makeSignal({ source: 'CONFIG_BASELINE', type: 'VPN_STATE_CHANGED', severity: 'MEDIUM', packageName: null, details: { old: 'off', new: 'on' } }),
      makeSignal({ source: 'CONFIG_BASELINE', type: 'PRIVATE_DNS_CHANGED', severity: 'LOW', packageName: null }),
      makeSignal({ source: 'CONFIG_BASELINE', type: 'USB_DEBUGGING_ENABLED', severity: 'MEDIUM', packageName: null }),
    ];
    const events = configEvents(signals, TEST_NOW);
    expect(events.map((e) => e.type)).toEqual(['CA_CERT_INSTALLED', 'SUSPICIOUS_VPN', 'CONFIG_TAMPER']);
    expect(events[0]?.id).toBe(deterministicId('config', 'USER_CA_CERT_ADDED_CN=Test CA'));
    expect(events[2]?.id).toBe(deterministicId('config', 'USB_DEBUGGING_ENABLED_'));
    expect(events[1]?.metadata).toEqual({ old: 'off', new: 'on' });
  });
});

describe('incident lifecycle', () => {
  const incident: SecurityIncident = {
    id: 'incident-1',
    createdAt: TEST_NOW,
    updatedAt: TEST_NOW,
    severity: 'HIGH',
    status: 'OPEN',
    title: 'Test incident',
    summary: 'summary',
    packageName: 'com.example.app',
    affectedPackages: ['com.example.app'],
    events: [],
    hypotheses: [],
    recommendedActions: [],
  };

  it('moves forward and records the time', () => {
    const next = transitionIncident(incident, 'INVESTIGATING', TEST_NOW + 5);
    expect(next.status).toBe('INVESTIGATING');
    expect(next.updatedAt).toBe(TEST_NOW + 5);
    expect(incident.status).toBe('OPEN');
  });

  it('refuses to leave a terminal state', () => {
    const resolved = transitionIncident(incident, 'RESOLVED', TEST_NOW);
    expect(isTerminal('RESOLVED')).toBe(true);
    expect(canTransition('RESOLVED', 'OPEN')).toBe(false);
    expect(() => transitionIncident(resolved, 'OPEN', TEST_NOW)).toThrow(IncidentTransitionError);
    expect(() => transitionIncident(resolved, 'OPEN', TEST_NOW)).toThrow('Cannot move incident from RESOLVED to OPEN');
  });

  it('never goes back to OPEN', () => {
    expect(canTransition('INVESTIGATING', 'OPEN')).toBe(false);
  });
});

describe('InMemoryEventStore', () => {
  it('keeps the first copy of an event id', async () => {
    const store = new InMemoryEventStore();
    const first = await store.recordEvents([makeEvent({ summary: 'first' })], TEST_NOW + HOUR);
    const second = await store.recordEvents([makeEvent({ summary: 'second' })], TEST_NOW + HOUR);
    expect([first, second]).toEqual([1, 0]);
    const [stored] = await store.listEvents();
    expect(stored?.summary).toBe('first');
  });

  it('filters by package and start time, newest first', async () => {
    const store = new InMemoryEventStore();
    await store.recordEvents(
      [
        makeEvent({ id: 'old', startTime: TEST_NOW - 2 * HOUR }),
        makeEvent({ id: 'new', startTime: TEST_NOW }),
        makeEvent({ id: 'other', packageName: 'com.example.other', startTime: TEST_NOW }),
      ],
      TEST_NOW + HOUR,
    );
    const all = await store.listEvents({ packageName: 'com.example.app' });
    expect(all.map((e) => e.id)).toEqual(['new', 'old']);
    const recent = await store.listEvents({ since: TEST_NOW - HOUR });
    expect(recent.map((e) => e.id)).toEqual(['new', 'other']);
  });

  it('marks events promoted and deletes expired ones', async () => {
    const store = new InMemoryEventStore();
    await store.recordEvents([makeEvent({ id: 'a' })], TEST_NOW);
    await store.recordEvents([makeEvent({ id: 'b' })], TEST_NOW + HOUR);
    await store.markPromoted(['a', 'missing']);
    expect((await store.listEvents()).find((e) => e.id === 'a')?.isPromoted).toBe(true);
    expect(await store.deleteExpired(TEST_NOW)).toBe(1);
    expect((await store.listEvents()).map((e) => e.id)).toEqual(['b']);
  });
});
