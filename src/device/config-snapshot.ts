import { createHash } from 'node:crypto';
import type { ConfigSnapshot } from '../evidence/input.js';
import { createSignal } from '../incidents/signals.js';
import type { SecuritySignal, SignalSeverity, SignalType } from '../incidents/types.js';

export type ConfigChangeType =
  | 'CA_CERT_ADDED'
  | 'CA_CERT_REMOVED'
  | 'PRIVATE_DNS_CHANGED'
  | 'VPN_ACTIVATED'
  | 'VPN_DEACTIVATED'
  | 'PROXY_CONFIGURED'
  | 'PROXY_REMOVED'
  | 'ACCESSIBILITY_SERVICE_ADDED'
  | 'ACCESSIBILITY_SERVICE_REMOVED'
  | 'NOTIFICATION_LISTENER_ADDED'
  | 'NOTIFICATION_LISTENER_REMOVED'
  | 'DEFAULT_SMS_CHANGED'
  | 'DEFAULT_DIALER_CHANGED'
  | 'DEVELOPER_OPTIONS_CHANGED'
  | 'USB_DEBUGGING_CHANGED'
  | 'UNKNOWN_SOURCES_CHANGED';

export interface ConfigChange {
  type: ConfigChangeType;
  severity: SignalSeverity;
  description: string;
  oldValue: string | null;
  newValue: string | null;
  /** The app the change is about, for per-app settings. */
  packageName: string | null;
}

export interface ConfigDelta {
  hasChanges: boolean;
  changes: ConfigChange[];
}

const CHANGE_SIGNAL_TYPE: Readonly<Record<ConfigChangeType, SignalType>> = {
  CA_CERT_ADDED: 'USER_CA_CERT_ADDED',
  CA_CERT_REMOVED: 'USER_CA_CERT_REMOVED',
  PRIVATE_DNS_CHANGED: 'PRIVATE_DNS_CHANGED',
  VPN_ACTIVATED: 'VPN_STATE_CHANGED',
  VPN_DEACTIVATED: 'VPN_STATE_CHANGED',
  PROXY_CONFIGURED: 'WIFI_PROXY_DETECTED',
  PROXY_REMOVED: 'WIFI_PROXY_DETECTED',
  ACCESSIBILITY_SERVICE_ADDED: 'UNKNOWN_ACCESSIBILITY_SERVICE',
  ACCESSIBILITY_SERVICE_REMOVED: 'UNKNOWN_ACCESSIBILITY_SERVICE',
  NOTIFICATION_LISTENER_ADDED: 'UNKNOWN_ACCESSIBILITY_SERVICE',
  NOTIFICATION_LISTENER_REMOVED: 'UNKNOWN_ACCESSIBILITY_SERVICE',
  DEFAULT_SMS_CHANGED: 'DEFAULT_APP_CHANGED',
  DEFAULT_DIALER_CHANGED: 'DEFAULT_APP_CHANGED',
  DEVELOPER_OPTIONS_CHANGED: 'DEVELOPER_OPTIONS_ENABLED',
  USB_DEBUGGING_CHANGED: 'USB_DEBUGGING_ENABLED',
  UNKNOWN_SOURCES_CHANGED: 'UNKNOWN_SOURCES_ENABLED',
};

function sorted(values: readonly string[]): string {
  return [...values].sort().join(',');
}

/** Hex SHA-256 over a canonical rendering; list order does not matter. */
export function configHash(s: ConfigSnapshot): string {
  const content = [
    `ca:${sorted(s.userCaCertFingerprints)}`,
    `dns:${s.privateDnsMode}:${s.privateDnsHostname ?? ''}`,
    `vpn:${s.vpnActive}:${s.vpnPackageName ?? ''}`,
    `proxy:${s.globalProxyConfigured}:${s.proxyHost ?? ''}`,
    `a11y:${sorted(s.enabledAccessibilityServices)}`,
    `notif:${sorted(s.enabledNotificationListeners)}`,
    `sms:${s.defaultSmsApp ?? ''}`,
    `dialer:${s.defaultDialerApp ?? ''}`,
    `dev:${s.developerOptionsEnabled}`,
    `usb:${s.usbDebuggingEnabled}`,
    `unknown:${s.installUnknownSourcesEnabled}`,
  ].join('|');
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

function added(before: readonly string[], after: readonly string[]): string[] {
  const old = new Set(before);
  return [...new Set(after)].filter((v) => !old.has(v)).sort();
}

function fingerprintPrefix(fp: string): string {
  return `${fp.slice(0, 16)}...`;
}

function toggle(
  type: ConfigChangeType,
  severity: SignalSeverity,
  label: string,
  before: boolean,
  after: boolean,
): ConfigChange | null {
  if (before === after) return null;
  return {
    type,
    severity,
    description: `${label} ${after ? 'enabled' : 'disabled'}`,
    oldValue: String(before),
    newValue: String(after),
    packageName: null,
  };
}

export function compareSnapshots(previous: ConfigSnapshot, current: ConfigSnapshot): ConfigDelta {
  const changes: ConfigChange[] = [];
  const push = (c: ConfigChange | null): void => {
    if (c !== null) changes.push(c);
  };

  for (const fp of added(previous.userCaCertFingerprints, current.userCaCertFingerprints)) {
    push({
      type: 'CA_CERT_ADDED',
      severity: 'HIGH',
      description: 'User CA certificate added',
      oldValue: null,
      newValue: fingerprintPrefix(fp),
      packageName: null,
    });
  }
  for (const fp of added(current.userCaCertFingerprints, previous.userCaCertFingerprints)) {
    push({
      type: 'CA_CERT_REMOVED',
      severity: 'MEDIUM',
      description: 'User CA certificate removed',
      oldValue: fingerprintPrefix(fp),
      newValue: null,
      packageName: null,
    });
  }

  if (
    previous.privateDnsMode !== current.privateDnsMode ||
    previous.privateDnsHostname !== current.privateDnsHostname
  ) {
    push({
      type: 'PRIVATE_DNS_CHANGED',
      severity: 'MEDIUM',
      description: 'Private DNS setting changed',
      oldValue: `${previous.privateDnsMode}:${previous.privateDnsHostname ?? ''}`,
      newValue: `${current.privateDnsMode}:${current.privateDnsHostname ?? ''}`,
      packageName: null,
    });
  }

  if (!previous.vpnActive && current.vpnActive) {
    push({
      type: 'VPN_ACTIVATED',
      severity: 'MEDIUM',
      description: 'VPN activated',
      oldValue: null,
      newValue: current.vpnPackageName,
      packageName: current.vpnPackageName,
    });
  } else if (previous.vpnActive && current.vpnActive && previous.vpnPackageName !== current.vpnPackageName) {
    push({
      type: 'VPN_ACTIVATED',
      severity: 'MEDIUM',
      description: 'VPN switched to another app',
      oldValue: previous.vpnPackageName,
      newValue: current.vpnPackageName,
      packageName: current.vpnPackageName,
    });
  } else if (previous.vpnActive && !current.vpnActive) {
    push({
      type: 'VPN_DEACTIVATED',
      severity: 'LOW',
      description: 'VPN deactivated',
      oldValue: previous.vpnPackageName,
      newValue: null,
      packageName: null,
    });
  }

  if (!previous.globalProxyConfigured && current.globalProxyConfigured) {
    push({
      type: 'PROXY_CONFIGURED',
      severity: 'HIGH',
      description: 'Global proxy configured',
      oldValue: null,
      newValue: current.proxyHost,
      packageName: null,
    });
  } else if (previous.globalProxyConfigured && !current.globalProxyConfigured) {
    push({
      type: 'PROXY_REMOVED',
      severity: 'LOW',
      description: 'Global proxy removed',
      oldValue: previous.proxyHost,
      newValue: null,
      packageName: null,
    });
  }

  for (const pkg of added(previous.enabledAccessibilityServices, current.enabledAccessibilityServices)) {
    push({
      type: 'ACCESSIBILITY_SERVICE_ADDED',
      severity: 'HIGH',
      description: `Accessibility service enabled: ${pkg}`,
      oldValue: null,
      newValue: pkg,
      packageName: pkg,
    });
  }
  for (const pkg of added(current.enabledAccessibilityServices, previous.enabledAccessibilityServices)) {
    push({
      type: 'ACCESSIBILITY_SERVICE_REMOVED',
      severity: 'LOW',
      description: `Accessibility service disabled: ${pkg}`,
      oldValue: pkg,
      newValue: null,
      packageName: pkg,
    });
  }

  for (const pkg of added(previous.enabledNotificationListeners, current.enabledNotificationListeners)) {
    push({
      type: 'NOTIFICATION_LISTENER_ADDED',
      severity: 'MEDIUM',
      description: `Notification access enabled: ${pkg}`,
      oldValue: null,
      newValue: pkg,
      packageName: pkg,
    });
  }
  for (const pkg of added(current.enabledNotificationListeners, previous.enabledNotificationListeners)) {
    push({
      type: 'NOTIFICATION_LISTENER_REMOVED',
      severity: 'LOW',
      description: `Notification access disabled: ${pkg}`,
      oldValue: pkg,
      newValue: null,
      packageName: pkg,
    });
  }

  if (previous.defaultSmsApp !== current.defaultSmsApp) {
    push({
      type: 'DEFAULT_SMS_CHANGED',
      severity: 'HIGH',
      description: 'Default SMS app changed',
      oldValue: previous.defaultSmsApp,
      newValue: current.defaultSmsApp,
      packageName: current.defaultSmsApp,
    });
  }
  if (previous.defaultDialerApp !== current.defaultDialerApp) {
    push({
      type: 'DEFAULT_DIALER_CHANGED',
      severity: 'MEDIUM',
      description: 'Default phone app changed',
      oldValue: previous.defaultDialerApp,
      newValue: current.defaultDialerApp,
      packageName: current.defaultDialerApp,
    });
  }

  push(
    toggle(
      'DEVELOPER_OPTIONS_CHANGED',
      'MEDIUM',
      'Developer options',
      previous.developerOptionsEnabled,
      current.developerOptionsEnabled,
    ),
  );
  push(toggle('USB_DEBUGGING_CHANGED', 'MEDIUM', 'USB debugging', previous.usbDebuggingEnabled, current.usbDebuggingEnabled));
  push(
    toggle(
      'UNKNOWN_SOURCES_CHANGED',
      'HIGH',
      'Installs from unknown sources',
      previous.installUnknownSourcesEnabled,
      current.installUnknownSourcesEnabled,
    ),
  );

  return { hasChanges: changes.length > 0, changes };
}

export function changesToSignals(delta: ConfigDelta, now: number): SecuritySignal[] {
  return delta.changes.map((change) => {
    const details: Record<string, string> = { change: change.type };
    if (change.oldValue !== null) details.old = change.oldValue;
    if (change.newValue !== null) details.new = change.newValue;
    return createSignal(
      {
        source: 'CONFIG_BASELINE',
        type: CHANGE_SIGNAL_TYPE[change.type],
        severity: change.severity,
        packageName: change.packageName,
        summary: change.description,
        details,
      },
      now,
    );
  });
}
