import type { ScannedAppEvidence } from '../evidence/input.js';
import { partitionFromPath } from '../evidence/installer.js';
import { highRiskSubset, permissionSetHash } from './permissions.js';
import type {
  AnomalySeverity,
  BaselineAnomaly,
  BaselineComparison,
  BaselineContext,
  BaselineRecord,
  BaselineSnapshot,
} from './types.js';

/** Relative thresholds for exported surface growth. */
export const SURFACE_RATIO_MEDIUM = 0.5;
export const SURFACE_DELTA_MEDIUM = 5;
export const SURFACE_FROM_ZERO_HIGH = 2;

export function snapshotFromEvidence(app: ScannedAppEvidence): BaselineSnapshot {
  return {
    packageName: app.packageName,
    certSha256: app.certSha256,
    versionCode: app.versionCode,
    versionName: app.versionName,
    isSystemApp: app.isSystemApp,
    installerPackage: app.installerPackage,
    apkPath: app.apkPath,
    permissionSetHash: permissionSetHash(app.requestedPermissions),
    highRiskPermissions: highRiskSubset([...app.requestedPermissions, ...app.grantedPermissions]),
    exportedActivityCount: app.exportedActivityCount,
    exportedServiceCount: app.exportedServiceCount,
    exportedReceiverCount: app.exportedReceiverCount,
    exportedProviderCount: app.exportedProviderCount,
    unprotectedExportedCount: app.unprotectedExportedCount,
  };
}

export function surfaceIncreaseSeverity(oldCount: number, newCount: number): AnomalySeverity {
  const delta = newCount - oldCount;
  if (oldCount === 0 && newCount >= SURFACE_FROM_ZERO_HIGH) return 'HIGH';
  if (oldCount > 0 && (delta / oldCount >= SURFACE_RATIO_MEDIUM || delta >= SURFACE_DELTA_MEDIUM)) {
    return 'MEDIUM';
  }
  return 'LOW';
}

function short(digest: string): string {
  return `${digest.slice(0, 16)}...`;
}

function compareAgainst(current: BaselineSnapshot, stored: BaselineRecord): BaselineAnomaly[] {
  const anomalies: BaselineAnomaly[] = [];

  if (stored.certSha256 !== current.certSha256) {
    anomalies.push({
      type: 'CERT_CHANGED',
      severity: 'CRITICAL',
      description: 'Signing certificate changed',
      details: `previous ${short(stored.certSha256)} current ${short(current.certSha256)}`,
    });
  }

  if (current.versionCode < stored.versionCode) {
    anomalies.push({
      type: 'VERSION_ROLLBACK',
      severity: 'HIGH',
      description: `Version rolled back: ${stored.versionCode} -> ${current.versionCode}`,
      details: null,
    });
  } else if (current.versionCode > stored.versionCode) {
    anomalies.push({
      type: 'VERSION_CHANGED',
      severity: 'LOW',
      description: `Version changed: ${stored.versionName ?? stored.versionCode} -> ${current.versionName ?? current.versionCode}`,
      details: null,
    });
  }

  if (
    stored.installerPackage !== null &&
    current.installerPackage !== null &&
    stored.installerPackage !== current.installerPackage
  ) {
    anomalies.push({
      type: 'INSTALLER_CHANGED',
      severity: 'MEDIUM',
      description: 'Install source changed',
      details: `previous ${stored.installerPackage} current ${current.installerPackage}`,
    });
  }

  if (stored.apkPath !== null && current.apkPath !== null) {
    const oldPartition = partitionFromPath(stored.apkPath);
    const newPartition = partitionFromPath(current.apkPath);
    if (oldPartition !== newPartition) {
      anomalies.push({
        type: 'PARTITION_CHANGED',
        severity: 'MEDIUM',
        description: `Install location changed: ${oldPartition} -> ${newPartition}`,
        details: `previous ${stored.apkPath} current ${current.apkPath}`,
      });
    }
  }

  if (
    stored.permissionSetHash !== '' &&
    current.permissionSetHash !== '' &&
    stored.permissionSetHash !== current.permissionSetHash
  ) {
    anomalies.push({
      type: 'PERMISSION_SET_CHANGED',
      severity: 'LOW',
      description: 'Requested permissions changed',
      details: null,
    });
  }

  const added = current.highRiskPermissions.filter((p) => !stored.highRiskPermissions.includes(p));
  if (added.length > 0) {
    anomalies.push({
      type: 'HIGH_RISK_PERMISSION_ADDED',
      severity: 'HIGH',
      description: `High-risk permissions added: ${added.map((p) => p.replace('android.permission.', '')).join(', ')}`,
      details: added.join(','),
    });
  }

  const oldSurface = stored.unprotectedExportedCount;
  const newSurface = current.unprotectedExportedCount;
  if (newSurface > oldSurface) {
    anomalies.push({
      type: 'EXPORTED_SURFACE_INCREASED',
      severity: surfaceIncreaseSeverity(oldSurface, newSurface),
      description: `Unprotected exported components: ${oldSurface} -> ${newSurface}`,
      details: null,
    });
  }

  return anomalies;
}

/**
 * Compares the current observation with the stored row. A package seen for
 * the first time only ever yields NEW_SYSTEM_APP, and only once the device
 * already has baselines.
 */
export function compareWithBaseline(
  current: BaselineSnapshot,
  stored: BaselineRecord | null,
  context: BaselineContext,
): BaselineComparison {
  if (stored === null) {
    const anomalies: BaselineAnomaly[] = [];
    if (current.isSystemApp && context.hasAnyBaseline) {
      anomalies.push({
        type: 'NEW_SYSTEM_APP',
        severity: 'HIGH',
        description: `New system component: ${current.packageName}`,
        details: 'Not present at the previous scan. Either an OTA update or an unauthorised system change.',
      });
    }
    return {
      packageName: current.packageName,
      status: 'NEW',
      anomalies,
      isFirstScan: !context.hasAnyBaseline,
      scanCount: 0,
    };
  }

  const anomalies = compareAgainst(current, stored);
  return {
    packageName: current.packageName,
    status: anomalies.length === 0 ? 'UNCHANGED' : 'CHANGED',
    anomalies,
    isFirstScan: false,
    scanCount: stored.scanCount,
  };
}

/** Next row for the store. Always called after compareWithBaseline. */
export function updateBaseline(
  current: BaselineSnapshot,
  stored: BaselineRecord | null,
  now: number,
): BaselineRecord {
  if (stored === null) {
    return {
      ...current,
      highRiskPermissions: [...current.highRiskPermissions],
      previousCertSha256: null,
      firstSeenAt: now,
      lastSeenAt: now,
      lastCertChangeAt: null,
      scanCount: 1,
    };
  }

  const certChanged = stored.certSha256 !== current.certSha256;
  return {
    ...current,
    highRiskPermissions: [...current.highRiskPermissions],
    previousCertSha256: certChanged ? stored.certSha256 : stored.previousCertSha256,
    firstSeenAt: stored.firstSeenAt,
    lastSeenAt: now,
    lastCertChangeAt: certChanged ? now : stored.lastCertChangeAt,
    scanCount: stored.scanCount + 1,
  };
}

export function findRemovedApps(
  stored: readonly BaselineRecord[],
  currentPackages: readonly string[],
): BaselineComparison[] {
  const present = new Set(currentPackages);
  return stored
    .filter((r) => !present.has(r.packageName))
    .map((r): BaselineComparison => ({
      packageName: r.packageName,
      status: 'REMOVED',
      anomalies: [],
      isFirstScan: false,
      scanCount: r.scanCount,
    }));
}
