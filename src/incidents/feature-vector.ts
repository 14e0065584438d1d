import { highRiskSubset } from '../baseline/permissions.js';
import type { BaselineComparison } from '../baseline/types.js';
import type { AppCategory } from '../catalog/categories.js';
import {
  emptySpecialAccess,
  hasAnySpecialAccess,
  isHighRiskCluster,
  type SpecialAccessSnapshot,
} from '../catalog/clusters.js';
import { LOW_TRUST_THRESHOLD } from '../catalog/combos.js';
import type { ScannedAppEvidence } from '../evidence/input.js';
import type { TrustEvidence } from '../evidence/types.js';
import { DANGEROUS_PERMISSIONS } from '../risk/derive-findings.js';
import type { AppVerdict } from '../risk/types.js';
import type { AppFeatureVector } from './types.js';

export interface FeatureVectorInput {
  app: ScannedAppEvidence;
  evidence: TrustEvidence;
  comparison: BaselineComparison;
  verdict: AppVerdict;
  category: AppCategory;
  specialAccess?: SpecialAccessSnapshot | null;
  now: number;
}

/** An app seen for the first time after the device already had a baseline. */
export function isNewApp(comparison: BaselineComparison): boolean {
  return comparison.status === 'NEW' && !comparison.isFirstScan;
}

export function buildFeatureVector(input: FeatureVectorInput): AppFeatureVector {
  const { app, evidence, comparison, verdict, category, now } = input;
  return {
    packageName: app.packageName,
    timestamp: now,
    identity: {
      trustScore: evidence.trustScore,
      trustLevel: evidence.trustLevel,
      certSha256: evidence.certSha256,
      certMatchType: evidence.certMatch.matchType,
      matchedDeveloper: evidence.certMatch.matchedDeveloper,
      installerType: evidence.installerInfo.installerType,
      installerPackage: evidence.installerInfo.installerPackage,
      isSystemApp: evidence.systemAppInfo.isSystemApp,
      isPlatformSigned: evidence.systemAppInfo.isPlatformSigned,
      hasSigningLineage: evidence.signingLineage.hasLineage,
      isNewApp: isNewApp(comparison),
    },
    change: {
      baselineStatus: comparison.status,
      isFirstScan: comparison.isFirstScan,
      anomalies: comparison.anomalies.map((a) => a.type),
      lastUpdateAt: app.lastUpdateTime ?? app.firstInstallTime,
      versionCode: app.versionCode,
      versionName: app.versionName,
      isVersionRollback: comparison.anomalies.some((a) => a.type === 'VERSION_ROLLBACK'),
    },
    capability: {
      activeHighRiskClusters: verdict.activeClusters.filter(isHighRiskCluster),
      unexpectedClusters: verdict.unexpectedClusters,
      dangerousPermissionCount: app.grantedPermissions.filter((p) => DANGEROUS_PERMISSIONS.has(p)).length,
      highRiskPermissions: highRiskSubset(app.grantedPermissions),
      privacyCapabilities: verdict.privacyCapabilities,
      matchedCombos: verdict.matchedCombos,
      appCategory: category,
    },
    surface: {
      exportedActivityCount: app.exportedActivityCount,
      exportedServiceCount: app.exportedServiceCount,
      exportedReceiverCount: app.exportedReceiverCount,
      exportedProviderCount: app.exportedProviderCount,
      unprotectedExportedCount: app.unprotectedExportedCount,
      hasSuspiciousNativeLibs: app.nativeLibFindings.some((l) => l.isSuspicious),
      nativeLibCount: app.nativeLibFindings.length,
      targetSdk: app.targetSdk,
      minSdk: app.minSdk,
      apkSizeBytes: app.apkSizeBytes,
    },
    specialAccess: input.specialAccess ?? emptySpecialAccess(app.packageName),
    verdict: {
      effectiveRisk: verdict.effectiveRisk,
      riskScore: verdict.riskScore,
      hardFindingCount: verdict.adjustedFindings.filter((f) => f.hardness === 'HARD').length,
      softFindingCount: verdict.adjustedFindings.filter((f) => f.hardness === 'SOFT').length,
      topReasons: verdict.topReasons,
    },
  };
}

export function hasActiveSpecialAccess(v: AppFeatureVector): boolean {
  return hasAnySpecialAccess(v.specialAccess);
}

export function isHighPriorityTarget(v: AppFeatureVector): boolean {
  return v.identity.trustScore < LOW_TRUST_THRESHOLD && hasActiveSpecialAccess(v);
}

export function hasRecentChanges(v: AppFeatureVector): boolean {
  return v.change.anomalies.length > 0 || v.change.baselineStatus === 'NEW';
}

export function hasSuspiciousProfile(v: AppFeatureVector): boolean {
  return (
    v.capability.unexpectedClusters.length > 0 &&
    (hasActiveSpecialAccess(v) || v.identity.installerType === 'SIDELOADED')
  );
}

export function shouldMonitor(v: AppFeatureVector): boolean {
  return (
    isHighPriorityTarget(v) ||
    hasSuspiciousProfile(v) ||
    v.verdict.effectiveRisk === 'CRITICAL' ||
    v.verdict.effectiveRisk === 'NEEDS_ATTENTION'
  );
}
