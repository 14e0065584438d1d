import type { CategoryCatalog } from '../src/catalog/categories.js';
import { emptySpecialAccess, type SpecialAccessSnapshot } from '../src/catalog/clusters.js';
import {
  ConfigSnapshotSchema,
  DeviceIntegrityEvidenceSchema,
  ScannedAppEvidenceSchema,
  type ConfigSnapshot,
  type DeviceIntegrityEvidence,
  type ScannedAppEvidence,
  type ScannedAppEvidenceInput,
} from '../src/evidence/input.js';
import type { InstallerInfo, TrustEvidence, TrustedAppsCatalog } from '../src/evidence/types.js';
import type {
  AppFeatureVector,
  CapabilityFeatures,
  ChangeFeatures,
  IdentityFeatures,
  SecurityEvent,
  SecuritySignal,
  SurfaceFeatures,
  VerdictSummary,
} from '../src/incidents/types.js';
import type { RiskInput } from '../src/risk/types.js';

export const TEST_NOW = 1_750_000_000_000;
export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;

export const P = 'android.permission.';

export const PLAY_CERT = '1111111111111111111111111111111111111111AAAAAAAAAAAAAAAAAAAAAAAA';
export const OTHER_CERT = 'FFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFFF';

export const TEST_TRUSTED_APPS: TrustedAppsCatalog = {
  developers: [
    {
      name: 'Example Labs',
      certDigests: ['1111111111111111111111111111111111111111'],
      packagePrefixes: ['com.example.labs.'],
      domain: 'PLAY_SIGNED',
    },
    {
      name: 'Example OEM',
      certDigests: ['4444444444444444444444444444444444444444'],
      packagePrefixes: ['com.exampleoem.'],
      domain: 'OEM_VENDOR',
    },
  ],
  verifiedApps: {
    'com.example.notes': ['5555555555555555555555555555555555555555'],
  },
};

export const TEST_CATEGORIES: CategoryCatalog = {
  rules: [
    { category: 'BANKING', match: [{ packageContains: ['bank'] }] },
    { category: 'VPN', match: [{ packageContains: ['vpn'] }] },
    { category: 'PHONE_DIALER', match: [{ packageContains: ['dialer'] }] },
    { category: 'ACCESSIBILITY_TOOL', match: [{ packageContains: ['talkback'] }] },
    { category: 'MESSAGING', match: [{ nameContains: ['chat'] }] },
  ],
  expectedPermissions: {
    BANKING: [`${P}ACCESS_FINE_LOCATION`, `${P}CAMERA`],
    PHONE_DIALER: [`${P}READ_CALL_LOG`, `${P}READ_SMS`, `${P}READ_CONTACTS`],
  },
};

export const PLAY_INSTALLER: InstallerInfo = {
  installerPackage: 'com.android.vending',
  installerType: 'PLAY_STORE',
  isExpectedInstaller: true,
};

export const SIDELOAD_INSTALLER: InstallerInfo = {
  installerPackage: 'com.example.fileshare',
  installerType: 'SIDELOADED',
  isExpectedInstaller: false,
};

export function makeApp(overrides: Partial<ScannedAppEvidenceInput> = {}): ScannedAppEvidence {
  return ScannedAppEvidenceSchema.parse({ packageName: 'com.example.app', ...overrides });
}

export function makeDevice(overrides: Partial<DeviceIntegrityEvidence> = {}): DeviceIntegrityEvidence {
  return DeviceIntegrityEvidenceSchema.parse(overrides);
}

export function makeConfig(overrides: Partial<ConfigSnapshot> = {}): ConfigSnapshot {
  return ConfigSnapshotSchema.parse(overrides);
}

export function makeSpecialAccess(
  packageName: string,
  overrides: Partial<SpecialAccessSnapshot> = {},
): SpecialAccessSnapshot {
  return { ...emptySpecialAccess(packageName), ...overrides };
}

export function makeEvidence(overrides: Partial<TrustEvidence> = {}): TrustEvidence {
  return {
    packageName: 'com.example.app',
    certSha256: OTHER_CERT,
    certMatch: {
      matchType: 'UNKNOWN',
      matchedDeveloper: null,
      knownCertDigests: [],
      currentCertDigest: OTHER_CERT,
    },
    installerInfo: PLAY_INSTALLER,
    systemAppInfo: {
      isSystemApp: false,
      isPrivilegedApp: false,
      isUpdatedSystemApp: false,
      partition: 'DATA',
      isPlatformSigned: false,
    },
    signerDomain: 'PLAY_SIGNED',
    signingLineage: { hasLineage: false, lineageLength: 0, lineageTrusted: false },
    deviceIntegrity: { isRooted: false, verifiedBootState: 'GREEN' },
    trustScore: 50,
    trustLevel: 'MODERATE',
    reasons: [],
    ...overrides,
  };
}

export function makeRiskInput(overrides: Partial<RiskInput> = {}): RiskInput {
  return {
    packageName: 'com.example.app',
    trustEvidence: makeEvidence(),
    rawFindings: [],
    grantedPermissions: [],
    category: 'OTHER',
    isNewApp: false,
    ...overrides,
  };
}

export function makeSignal(overrides: Partial<SecuritySignal> = {}): SecuritySignal {
  return {
    id: 'signal-1',
    timestamp: TEST_NOW,
    source: 'TRUST_ENGINE',
    type: 'COMBO_DETECTED',
    severity: 'HIGH',
    packageName: 'com.example.app',
    summary: 'Test signal',
    details: {},
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<SecurityEvent> = {}): SecurityEvent {
  return {
    id: 'event-1',
    startTime: TEST_NOW,
    endTime: TEST_NOW,
    source: 'TRUST_ENGINE',
    type: 'OTHER',
    severity: 'HIGH',
    packageName: 'com.example.app',
    summary: 'Test event',
    signals: [],
    metadata: {},
    isPromoted: false,
    ...overrides,
  };
}

export interface FeatureVectorOverrides {
  packageName?: string;
  timestamp?: number;
  identity?: Partial<IdentityFeatures>;
  change?: Partial<ChangeFeatures>;
  capability?: Partial<CapabilityFeatures>;
  surface?: Partial<SurfaceFeatures>;
  specialAccess?: Partial<SpecialAccessSnapshot>;
  verdict?: Partial<VerdictSummary>;
}

export function makeFeatureVector(overrides: FeatureVectorOverrides = {}): AppFeatureVector {
  const packageName = overrides.packageName ?? 'com.example.app';
  return {
    packageName,
    timestamp: overrides.timestamp ?? TEST_NOW,
    identity: {
      trustScore: 50,
      trustLevel: 'MODERATE',
      certSha256: OTHER_CERT,
      certMatchType: 'UNKNOWN',
      matchedDeveloper: null,
      installerType: 'PLAY_STORE',
      installerPackage: 'com.android.vending',
      isSystemApp: false,
      isPlatformSigned: false,
      hasSigningLineage: false,
      isNewApp: false,
      ...overrides.identity,
    },
    change: {
      baselineStatus: 'UNCHANGED',
      isFirstScan: false,
      anomalies: [],
      lastUpdateAt: null,
      versionCode: 1,
      versionName: '1.0',
      isVersionRollback: false,
      ...overrides.change,
    },
    capability: {
      activeHighRiskClusters: [],
      unexpectedClusters: [],
      dangerousPermissionCount: 0,
      highRiskPermissions: [],
      privacyCapabilities: [],
      matchedCombos: [],
      appCategory: 'OTHER',
      ...overrides.capability,
    },
    surface: {
      exportedActivityCount: 0,
      exportedServiceCount: 0,
      exportedReceiverCount: 0,
      exportedProviderCount: 0,
      unprotectedExportedCount: 0,
      hasSuspiciousNativeLibs: false,
      nativeLibCount: 0,
      targetSdk: 34,
      minSdk: 26,
      apkSizeBytes: 1024,
      ...overrides.surface,
    },
    specialAccess: makeSpecialAccess(packageName, overrides.specialAccess),
    verdict: {
      effectiveRisk: 'SAFE',
      riskScore: 0,
      hardFindingCount: 0,
      softFindingCount: 0,
      topReasons: [],
      ...overrides.verdict,
    },
  };
}
