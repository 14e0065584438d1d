export type CapabilityCluster =
  | 'SMS'
  | 'CALL_LOG'
  | 'ACCESSIBILITY'
  | 'OVERLAY'
  | 'INSTALL_PACKAGES'
  | 'VPN'
  | 'DEVICE_ADMIN'
  | 'NOTIFICATION_LISTENER'
  | 'BACKGROUND_LOCATION';

/** Per-package real enabled state of special access services. */
export interface SpecialAccessSnapshot {
  packageName: string;
  accessibilityEnabled: boolean;
  notificationListenerEnabled: boolean;
  deviceAdminEnabled: boolean;
  isDefaultSms: boolean;
  isDefaultDialer: boolean;
  overlayEnabled: boolean;
  batteryOptimizationIgnored: boolean;
}

type SpecialAccessToggle =
  | 'accessibilityEnabled'
  | 'notificationListenerEnabled'
  | 'deviceAdminEnabled'
  | 'overlayEnabled';

export interface ClusterDefinition {
  permissions: readonly string[];
  isHighRisk: boolean;
  /** Snapshot flag that must be on for the cluster to count, when a snapshot is known. */
  specialAccess: SpecialAccessToggle | null;
}

const P = 'android.permission.';

export const CLUSTERS: Readonly<Record<CapabilityCluster, ClusterDefinition>> = {
  SMS: {
    permissions: [`${P}READ_SMS`, `${P}SEND_SMS`, `${P}RECEIVE_SMS`],
    isHighRisk: true,
    specialAccess: null,
  },
  CALL_LOG: {
    permissions: [`${P}READ_CALL_LOG`, `${P}WRITE_CALL_LOG`],
    isHighRisk: true,
    specialAccess: null,
  },
  ACCESSIBILITY: {
    permissions: [`${P}BIND_ACCESSIBILITY_SERVICE`],
    isHighRisk: true,
    specialAccess: 'accessibilityEnabled',
  },
  OVERLAY: {
    permissions: [`${P}SYSTEM_ALERT_WINDOW`],
    isHighRisk: true,
    specialAccess: 'overlayEnabled',
  },
  INSTALL_PACKAGES: {
    permissions: [`${P}REQUEST_INSTALL_PACKAGES`],
    isHighRisk: true,
    specialAccess: null,
  },
  VPN: {
    permissions: [`${P}BIND_VPN_SERVICE`],
    isHighRisk: true,
    specialAccess: null,
  },
  DEVICE_ADMIN: {
    permissions: [`${P}BIND_DEVICE_ADMIN`],
    isHighRisk: true,
    specialAccess: 'deviceAdminEnabled',
  },
  NOTIFICATION_LISTENER: {
    permissions: [`${P}BIND_NOTIFICATION_LISTENER_SERVICE`],
    isHighRisk: true,
    specialAccess: 'notificationListenerEnabled',
  },
  BACKGROUND_LOCATION: {
    permissions: [`${P}ACCESS_BACKGROUND_LOCATION`],
    isHighRisk: false,
    specialAccess: null,
  },
};

function isCluster(value: string): value is CapabilityCluster {
  return Object.prototype.hasOwnProperty.call(CLUSTERS, value);
}

export const CLUSTER_NAMES: readonly CapabilityCluster[] = Object.keys(CLUSTERS).filter(isCluster);

/** Clusters whose activation together with a sideload switch is treated as dangerous. */
export const DANGEROUS_CLUSTERS: ReadonlySet<CapabilityCluster> = new Set<CapabilityCluster>([
  'ACCESSIBILITY',
  'NOTIFICATION_LISTENER',
  'VPN',
  'INSTALL_PACKAGES',
  'DEVICE_ADMIN',
]);

export function isHighRiskCluster(cluster: CapabilityCluster): boolean {
  return CLUSTERS[cluster].isHighRisk;
}

/**
 * A cluster is active when one of its permissions is granted. For toggleable
 * special access the snapshot, when present, must also show it enabled.
 */
export function isClusterActive(
  cluster: CapabilityCluster,
  grantedPermissions: readonly string[],
  specialAccess?: SpecialAccessSnapshot | null,
): boolean {
  const def = CLUSTERS[cluster];
  const granted = def.permissions.some((p) => grantedPermissions.includes(p));
  if (!granted) return false;
  if (def.specialAccess === null || specialAccess == null) return true;
  return specialAccess[def.specialAccess];
}

export function activeClusters(
  grantedPermissions: readonly string[],
  specialAccess?: SpecialAccessSnapshot | null,
): CapabilityCluster[] {
  return CLUSTER_NAMES.filter((c) => isClusterActive(c, grantedPermissions, specialAccess));
}

export function emptySpecialAccess(packageName: string): SpecialAccessSnapshot {
  return {
    packageName,
    accessibilityEnabled: false,
    notificationListenerEnabled: false,
    deviceAdminEnabled: false,
    isDefaultSms: false,
    isDefaultDialer: false,
    overlayEnabled: false,
    batteryOptimizationIgnored: false,
  };
}

export function hasAnySpecialAccess(snapshot: SpecialAccessSnapshot): boolean {
  return (
    snapshot.accessibilityEnabled ||
    snapshot.notificationListenerEnabled ||
    snapshot.deviceAdminEnabled ||
    snapshot.isDefaultSms ||
    snapshot.isDefaultDialer ||
    snapshot.overlayEnabled ||
    snapshot.batteryOptimizationIgnored
  );
}

export function activeSpecialAccessLabels(snapshot: SpecialAccessSnapshot): string[] {
  const labels: string[] = [];
  if (snapshot.accessibilityEnabled) labels.push('accessibility');
  if (snapshot.notificationListenerEnabled) labels.push('notification listener');
  if (snapshot.deviceAdminEnabled) labels.push('device admin');
  if (snapshot.isDefaultSms) labels.push('default SMS');
  if (snapshot.isDefaultDialer) labels.push('default dialer');
  if (snapshot.overlayEnabled) labels.push('overlay');
  if (snapshot.batteryOptimizationIgnored) labels.push('battery optimization ignored');
  return labels;
}
