import type { DeviceIntegrityEvidence, Partition } from './input.js';

export type CertMatchType = 'DEVELOPER_MATCH' | 'APP_MATCH' | 'CERT_MISMATCH' | 'UNKNOWN';

export type InstallerType =
  | 'PLAY_STORE'
  | 'SYSTEM_INSTALLER'
  | 'SAMSUNG_STORE'
  | 'HUAWEI_APPGALLERY'
  | 'AMAZON_APPSTORE'
  | 'MDM_INSTALLER'
  | 'SIDELOADED'
  | 'UNKNOWN';

export type TrustLevel = 'HIGH' | 'MODERATE' | 'LOW' | 'ANOMALOUS';

/** Which signing authority a package should belong to, independent of its actual certificate. */
export type TrustDomain = 'PLAY_SIGNED' | 'PLATFORM_SIGNED' | 'APEX_MODULE' | 'OEM_VENDOR' | 'UNKNOWN';

export interface CertMatchResult {
  matchType: CertMatchType;
  matchedDeveloper: string | null;
  knownCertDigests: string[];
  currentCertDigest: string;
}

export interface InstallerInfo {
  installerPackage: string | null;
  installerType: InstallerType;
  isExpectedInstaller: boolean;
}

export interface SystemAppInfo {
  isSystemApp: boolean;
  isPrivilegedApp: boolean;
  isUpdatedSystemApp: boolean;
  partition: Partition;
  isPlatformSigned: boolean;
}

export interface SigningLineageInfo {
  hasLineage: boolean;
  lineageLength: number;
  lineageTrusted: boolean;
}

export interface TrustReason {
  evidence: string;
  contribution: number;
  isPositive: boolean;
}

export interface TrustEvidence {
  packageName: string;
  certSha256: string;
  certMatch: CertMatchResult;
  installerInfo: InstallerInfo;
  systemAppInfo: SystemAppInfo;
  signerDomain: TrustDomain;
  signingLineage: SigningLineageInfo;
  deviceIntegrity: DeviceIntegrityEvidence;
  trustScore: number;
  trustLevel: TrustLevel;
  reasons: TrustReason[];
}

export interface TrustedDeveloper {
  name: string;
  certDigests: string[];
  packagePrefixes: string[];
  domain: TrustDomain;
}

/** Static whitelist, loaded once and passed by reference into the engine. */
export interface TrustedAppsCatalog {
  developers: TrustedDeveloper[];
  /** Exact package name to the digests it may be signed with (rotation keeps several). */
  verifiedApps: Record<string, string[]>;
}

export interface DeveloperCertMatch {
  developerName: string;
  expectedCert: string;
  certMatches: boolean;
  entryDomain: TrustDomain;
}
