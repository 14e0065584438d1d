import type { DeviceIntegrityEvidence, ScannedAppEvidence } from './input.js';
import type {
  CertMatchResult,
  SigningLineageInfo,
  SystemAppInfo,
  TrustDomain,
  TrustEvidence,
  TrustLevel,
  TrustReason,
  TrustedAppsCatalog,
} from './types.js';
import { checkInstaller, installerLabel, partitionFromPath } from './installer.js';
import {
  certPrefix,
  classifySignerDomain,
  digestMatches,
  getVerifiedAppCerts,
  matchDeveloperCert,
} from './signer-domain.js';

export const UNKNOWN_CERT = 'UNKNOWN';

export const TRUST_WEIGHTS = {
  systemApp: 15,
  platformSigned: 15,
  certMatch: 30,
  certMismatch: -20,
  expectedInstaller: 20,
  sideloaded: -5,
  signingLineage: 10,
  verifiedBootGreen: 10,
  verifiedBootBroken: -10,
  rooted: -15,
} as const;

export const HIGH_TRUST_THRESHOLD = 70;
export const MODERATE_TRUST_THRESHOLD = 40;

function systemAppInfo(app: ScannedAppEvidence): SystemAppInfo {
  return {
    isSystemApp: app.isSystemApp,
    isPrivilegedApp: app.isPrivilegedApp,
    isUpdatedSystemApp: app.isUpdatedSystemApp,
    partition: app.partition ?? partitionFromPath(app.apkPath),
    isPlatformSigned: app.isPlatformSigned,
  };
}

function signingLineage(app: ScannedAppEvidence): SigningLineageInfo {
  return {
    hasLineage: app.hasSigningLineage,
    lineageLength: app.signingLineageLength,
    // Past signers on record mean the key rotation chain is intact.
    lineageTrusted: app.hasSigningLineage && app.signingLineageLength > 1,
  };
}

export function verifyCertificate(
  catalog: TrustedAppsCatalog,
  packageName: string,
  certSha256: string,
  signerDomain: TrustDomain,
): CertMatchResult {
  const unknown: CertMatchResult = {
    matchType: 'UNKNOWN',
    matchedDeveloper: null,
    knownCertDigests: [],
    currentCertDigest: certSha256,
  };
  if (certSha256 === UNKNOWN_CERT) return unknown;

  const prefix = certPrefix(certSha256);

  const appCerts = getVerifiedAppCerts(catalog, packageName);
  if (appCerts !== null) {
    const matches = appCerts.some((d) => digestMatches(prefix, d));
    return {
      matchType: matches ? 'APP_MATCH' : 'CERT_MISMATCH',
      matchedDeveloper: matches ? packageName : null,
      knownCertDigests: [...appCerts],
      currentCertDigest: certSha256,
    };
  }

  const developer = matchDeveloperCert(catalog, packageName, prefix, signerDomain);
  if (developer !== null) {
    return {
      matchType: developer.certMatches ? 'DEVELOPER_MATCH' : 'CERT_MISMATCH',
      matchedDeveloper: developer.developerName,
      knownCertDigests: [developer.expectedCert],
      currentCertDigest: certSha256,
    };
  }

  return unknown;
}

export function trustLevelFor(
  score: number,
  certMatch: CertMatchResult,
  device: DeviceIntegrityEvidence,
  system: SystemAppInfo,
): TrustLevel {
  if (certMatch.matchType === 'CERT_MISMATCH') return 'ANOMALOUS';
  if (device.isRooted && system.isSystemApp && !system.isPlatformSigned) return 'ANOMALOUS';
  if (score >= HIGH_TRUST_THRESHOLD) return 'HIGH';
  if (score >= MODERATE_TRUST_THRESHOLD) return 'MODERATE';
  return 'LOW';
}

/**
 * Scores identity and provenance of one app. Pure: the device integrity
 * facts are collected once per scan session by the caller.
 */
export function collectEvidence(
  app: ScannedAppEvidence,
  device: DeviceIntegrityEvidence,
  catalog: TrustedAppsCatalog,
): TrustEvidence {
  const reasons: TrustReason[] = [];
  let score = 0;
  const add = (evidence: string, contribution: number): void => {
    score += contribution;
    reasons.push({ evidence, contribution, isPositive: contribution >= 0 });
  };

  // System status goes first: the signer domain depends on it.
  const system = systemAppInfo(app);
  if (system.isSystemApp) add(`System app (${system.partition.toLowerCase()} partition)`, TRUST_WEIGHTS.systemApp);
  if (system.isPlatformSigned) add('Signed with the platform key', TRUST_WEIGHTS.platformSigned);

  const signerDomain = classifySignerDomain(
    system.isSystemApp,
    app.isApex,
    system.isPlatformSigned,
    system.partition,
    app.apkPath,
  );

  const certMatch = verifyCertificate(catalog, app.packageName, app.certSha256, signerDomain);
  switch (certMatch.matchType) {
    case 'DEVELOPER_MATCH':
      add(`Certificate matches known developer ${certMatch.matchedDeveloper ?? ''}`.trim(), TRUST_WEIGHTS.certMatch);
      break;
    case 'APP_MATCH':
      add('Certificate matches the verified app', TRUST_WEIGHTS.certMatch);
      break;
    case 'CERT_MISMATCH':
      add('Certificate does not match the expected signer', TRUST_WEIGHTS.certMismatch);
      break;
    case 'UNKNOWN':
      add('App is not on the verified list', 0);
      break;
  }

  const installerInfo = checkInstaller(app.installerPackage);
  if (installerInfo.isExpectedInstaller) {
    add(`Installed from ${installerLabel(installerInfo.installerType)}`, TRUST_WEIGHTS.expectedInstaller);
  } else if (installerInfo.installerType === 'SIDELOADED') {
    add('Installed outside an app store', TRUST_WEIGHTS.sideloaded);
  }

  const lineage = signingLineage(app);
  if (lineage.hasLineage && lineage.lineageTrusted) {
    add(`Signing key rotation verified (${lineage.lineageLength} keys)`, TRUST_WEIGHTS.signingLineage);
  }

  switch (device.verifiedBootState) {
    case 'GREEN':
      add('Device passed verified boot', TRUST_WEIGHTS.verifiedBootGreen);
      break;
    case 'ORANGE':
    case 'RED':
      add('Bootloader unlocked, system components may be replaced', TRUST_WEIGHTS.verifiedBootBroken);
      break;
    case 'YELLOW':
    case 'UNKNOWN':
      break;
  }
  if (device.isRooted) add('Root detected', TRUST_WEIGHTS.rooted);

  const trustScore = Math.min(100, Math.max(0, score));

  return {
    packageName: app.packageName,
    certSha256: app.certSha256,
    certMatch,
    installerInfo,
    systemAppInfo: system,
    signerDomain,
    signingLineage: lineage,
    deviceIntegrity: { ...device },
    trustScore,
    trustLevel: trustLevelFor(trustScore, certMatch, device, system),
    reasons,
  };
}
