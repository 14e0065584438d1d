import type { BaselineAnomaly, BaselineComparison, BaselineRecord } from '../baseline/types.js';
import { highRiskSubset } from '../baseline/permissions.js';
import { expectedClusters, type AppCategory } from '../catalog/categories.js';
import { activeClusters, isHighRiskCluster, type SpecialAccessSnapshot } from '../catalog/clusters.js';
import type { RawFinding } from '../catalog/findings.js';
import type { ScannedAppEvidence } from '../evidence/input.js';
import { classifyInstaller, partitionFromPath } from '../evidence/installer.js';
import { detectPartitionAnomaly } from '../evidence/signer-domain.js';
import type { TrustEvidence } from '../evidence/types.js';

/** Runtime-dangerous permissions counted for over-privilege. */
export const DANGEROUS_PERMISSIONS: ReadonlySet<string> = new Set(
  [
    'CAMERA',
    'RECORD_AUDIO',
    'READ_CONTACTS',
    'WRITE_CONTACTS',
    'GET_ACCOUNTS',
    'ACCESS_FINE_LOCATION',
    'ACCESS_COARSE_LOCATION',
    'ACCESS_BACKGROUND_LOCATION',
    'READ_SMS',
    'SEND_SMS',
    'RECEIVE_SMS',
    'RECEIVE_MMS',
    'READ_CALL_LOG',
    'WRITE_CALL_LOG',
    'CALL_PHONE',
    'ANSWER_PHONE_CALLS',
    'READ_PHONE_STATE',
    'READ_PHONE_NUMBERS',
    'PROCESS_OUTGOING_CALLS',
    'BODY_SENSORS',
    'ACTIVITY_RECOGNITION',
    'READ_CALENDAR',
    'WRITE_CALENDAR',
    'READ_EXTERNAL_STORAGE',
    'WRITE_EXTERNAL_STORAGE',
  ].map((p) => `android.permission.${p}`),
);

export const OVER_PRIVILEGED_MIN = 3;
export const LEGACY_TARGET_SDK = 28;
export const ANCIENT_TARGET_SDK = 26;
export const EXPORTED_COMPONENTS_LOW_MAX = 3;

export interface FindingContext {
  app: ScannedAppEvidence;
  evidence: TrustEvidence;
  comparison: BaselineComparison;
  /** Row the comparison was made against, null on first sight. */
  stored: BaselineRecord | null;
  category: AppCategory;
  expectedPermissions: readonly string[];
  specialAccess?: SpecialAccessSnapshot | null;
}

function short(name: string): string {
  return name.replace('android.permission.', '');
}

function fromAnomaly(anomaly: BaselineAnomaly, ctx: FindingContext): RawFinding | null {
  const { app, evidence, stored } = ctx;
  switch (anomaly.type) {
    case 'CERT_CHANGED':
      // Returning to the previous key is drift, not a fresh re-sign.
      if (stored?.previousCertSha256 != null && stored.previousCertSha256 === app.certSha256) {
        return {
          type: 'SIGNATURE_DRIFT',
          severity: 'HIGH',
          title: 'Signing key switched back to a previous certificate',
          description: anomaly.details ?? anomaly.description,
        };
      }
      return {
        type: 'BASELINE_SIGNATURE_CHANGE',
        severity: 'CRITICAL',
        title: 'Signing certificate changed since the last scan',
        description: anomaly.details ?? anomaly.description,
      };
    case 'NEW_SYSTEM_APP':
      return {
        type: 'BASELINE_NEW_SYSTEM_APP',
        severity: 'HIGH',
        title: 'New system component appeared',
        description: anomaly.description,
      };
    case 'VERSION_ROLLBACK':
      return evidence.installerInfo.isExpectedInstaller
        ? {
            type: 'VERSION_ROLLBACK_TRUSTED',
            severity: 'MEDIUM',
            title: 'Version rolled back by a trusted store',
            description: anomaly.description,
          }
        : {
            type: 'VERSION_ROLLBACK',
            severity: 'HIGH',
            title: 'Version rolled back',
            description: anomaly.description,
          };
    case 'INSTALLER_CHANGED': {
      const type = classifyInstaller(app.installerPackage);
      return type === 'SIDELOADED' || type === 'UNKNOWN'
        ? {
            type: 'INSTALLER_ANOMALY',
            severity: 'MEDIUM',
            title: 'Install source changed to an unverified source',
            description: anomaly.details ?? anomaly.description,
          }
        : {
            type: 'INSTALLER_ANOMALY_VERIFIED',
            severity: 'LOW',
            title: 'Install source changed to another store',
            description: anomaly.details ?? anomaly.description,
          };
    }
    case 'HIGH_RISK_PERMISSION_ADDED':
      // LOW keeps it below the CRITICAL cut; the trust-gated rules decide.
      return {
        type: 'HIGH_RISK_PERMISSION_ADDED',
        severity: 'LOW',
        title: 'High-risk permission added in an update',
        description: anomaly.description,
      };
    case 'EXPORTED_SURFACE_INCREASED':
      return {
        type: 'EXPORTED_SURFACE_INCREASED',
        severity: anomaly.severity,
        title: 'More unprotected exported components',
        description: anomaly.description,
      };
    case 'PARTITION_CHANGED': {
      const movedToData = partitionFromPath(app.apkPath) === 'DATA';
      if (app.isUpdatedSystemApp && movedToData) return null;
      return {
        type: 'PARTITION_ANOMALY',
        severity: 'MEDIUM',
        title: 'Install location changed',
        description: anomaly.description,
      };
    }
    case 'VERSION_CHANGED':
    case 'PERMISSION_SET_CHANGED':
      return null;
  }
}

/**
 * Maps evidence and baseline anomalies of one app to typed findings. The
 * hardness of each finding follows from its type alone.
 */
export function deriveFindings(ctx: FindingContext): RawFinding[] {
  const { app, evidence, comparison, category, expectedPermissions } = ctx;
  const findings: RawFinding[] = [];

  if (app.isDebugSigned) {
    findings.push({
      type: 'DEBUG_SIGNATURE',
      severity: 'HIGH',
      title: 'Signed with a debug certificate',
      description: 'Release builds are never signed with the Android debug key.',
    });
  }

  if (evidence.certMatch.matchType === 'CERT_MISMATCH') {
    findings.push({
      type: 'SIGNATURE_MISMATCH',
      severity: 'CRITICAL',
      title: 'Certificate does not match the known developer',
      description: `Expected one of ${evidence.certMatch.knownCertDigests.join(', ')}`,
    });
  }

  for (const anomaly of comparison.anomalies) {
    const finding = fromAnomaly(anomaly, ctx);
    if (finding !== null) findings.push(finding);
  }

  const partitionIssue = detectPartitionAnomaly(
    app.packageName,
    app.isSystemApp,
    app.apkPath,
    evidence.systemAppInfo.partition,
    app.isUpdatedSystemApp,
  );
  if (partitionIssue !== null) {
    findings.push({
      type: 'PARTITION_ANOMALY',
      severity: 'HIGH',
      title: 'System app outside the system partitions',
      description: partitionIssue,
    });
  }

  const suspiciousLibs = app.nativeLibFindings.filter((l) => l.isSuspicious);
  if (suspiciousLibs.length > 0) {
    findings.push({
      type: 'SUSPICIOUS_NATIVE_LIB',
      severity: 'MEDIUM',
      title: 'Suspicious native libraries',
      description: suspiciousLibs.map((l) => l.name).join(', '),
    });
  }

  const hooking = app.nativeLibFindings.some((l) => l.suspicionType === 'HOOKING');
  const bootState = evidence.deviceIntegrity.verifiedBootState;
  if (hooking && (evidence.deviceIntegrity.isRooted || bootState === 'ORANGE' || bootState === 'RED')) {
    findings.push({
      type: 'INTEGRITY_FAIL_WITH_HOOKING',
      severity: 'HIGH',
      title: 'Hooking framework on a compromised device',
      description: 'A hooking library is bundled and device integrity checks fail.',
    });
  }

  if (app.targetSdk > 0 && app.targetSdk <= LEGACY_TARGET_SDK) {
    findings.push({
      type: 'OLD_TARGET_SDK',
      severity: app.targetSdk < ANCIENT_TARGET_SDK ? 'HIGH' : 'MEDIUM',
      title: `Targets an old Android version (API ${app.targetSdk})`,
      description: 'Old target SDKs opt out of newer platform protections.',
    });
  }

  if (app.unprotectedExportedCount > 0) {
    findings.push({
      type: 'EXPORTED_COMPONENTS',
      severity: app.unprotectedExportedCount <= EXPORTED_COMPONENTS_LOW_MAX ? 'LOW' : 'MEDIUM',
      title: `${app.unprotectedExportedCount} unprotected exported components`,
      description: 'Other apps can start these components without a permission.',
    });
  }

  const unexpectedDangerous = app.grantedPermissions.filter(
    (p) => DANGEROUS_PERMISSIONS.has(p) && !expectedPermissions.includes(p),
  );
  if (unexpectedDangerous.length >= OVER_PRIVILEGED_MIN) {
    findings.push({
      type: 'OVER_PRIVILEGED',
      severity: 'MEDIUM',
      title: `${unexpectedDangerous.length} permissions unusual for this kind of app`,
      description: unexpectedDangerous.map(short).join(', '),
    });
  }

  if (!app.isSystemApp) {
    const unexpectedHighRisk = highRiskSubset(app.grantedPermissions).filter((p) => !expectedPermissions.includes(p));
    if (unexpectedHighRisk.length > 0) {
      findings.push({
        type: 'CRITICAL_PERMISSION',
        severity: 'MEDIUM',
        title: 'Sensitive permissions granted',
        description: unexpectedHighRisk.map(short).join(', '),
      });
    }
  }

  const expected = expectedClusters(category, evidence.trustScore);
  for (const cluster of activeClusters(app.grantedPermissions, ctx.specialAccess)) {
    if (!isHighRiskCluster(cluster) || expected.includes(cluster)) continue;
    findings.push({
      type: 'HIGH_RISK_CAPABILITY',
      severity: 'MEDIUM',
      title: `Active ${cluster.toLowerCase().replace(/_/g, ' ')} capability`,
      description: `${cluster} is not typical for ${category.toLowerCase()} apps.`,
    });
  }

  if (!evidence.installerInfo.isExpectedInstaller && !app.isSystemApp) {
    findings.push({
      type: 'NOT_PLAY_SIGNED',
      severity: 'LOW',
      title: 'Not installed from a recognised store',
      description: `Installer: ${app.installerPackage ?? 'unknown'}`,
    });
  }

  return findings;
}
