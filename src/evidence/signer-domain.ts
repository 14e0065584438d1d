import type { Partition } from './input.js';
import type { DeveloperCertMatch, TrustDomain, TrustedAppsCatalog } from './types.js';

export function classifySignerDomain(
  isSystemApp: boolean,
  isApex: boolean,
  isPlatformSigned: boolean,
  partition: Partition,
  apkPath: string | null,
): TrustDomain {
  if (isApex || (apkPath?.startsWith('/apex/') ?? false)) return 'APEX_MODULE';
  if (isPlatformSigned) return 'PLATFORM_SIGNED';
  if (isSystemApp && (partition === 'VENDOR' || partition === 'PRODUCT')) return 'OEM_VENDOR';
  if (isSystemApp) return 'PLATFORM_SIGNED';
  return 'PLAY_SIGNED';
}

/** Outside the Play domain a whitelist miss is expected and never means a mismatch. */
export function isExpectedSignerMismatch(domain: TrustDomain): boolean {
  return domain !== 'PLAY_SIGNED' && domain !== 'UNKNOWN';
}

export function certPrefix(certSha256: string): string {
  return certSha256.slice(0, 40).toUpperCase();
}

export function digestMatches(prefix: string, knownDigest: string): boolean {
  const known = knownDigest.toUpperCase();
  return prefix.startsWith(known) || known.startsWith(prefix);
}

export function getVerifiedAppCerts(catalog: TrustedAppsCatalog, packageName: string): string[] | null {
  return Object.prototype.hasOwnProperty.call(catalog.verifiedApps, packageName)
    ? catalog.verifiedApps[packageName] ?? null
    : null;
}

/**
 * First developer whose package prefix covers the package. With a caller
 * domain, entries from other domains are skipped so a platform-signed app is
 * never compared against a Play developer key.
 */
export function matchDeveloperCert(
  catalog: TrustedAppsCatalog,
  packageName: string,
  prefix: string,
  callerDomain?: TrustDomain,
): DeveloperCertMatch | null {
  for (const dev of catalog.developers) {
    if (!dev.packagePrefixes.some((p) => packageName.startsWith(p))) continue;
    if (callerDomain !== undefined && dev.domain !== callerDomain) continue;
    const [expectedCert] = dev.certDigests;
    if (expectedCert === undefined) continue;
    return {
      developerName: dev.name,
      expectedCert,
      certMatches: dev.certDigests.some((d) => digestMatches(prefix, d)),
      entryDomain: dev.domain,
    };
  }
  return null;
}

/**
 * A non-system app is never flagged. A system app is flagged when it lives
 * under /data/app or on the DATA partition without being an updated system app.
 */
export function detectPartitionAnomaly(
  packageName: string,
  isSystemApp: boolean,
  apkPath: string | null,
  partition: Partition,
  isUpdatedSystemApp = false,
): string | null {
  if (!isSystemApp) return null;
  if (apkPath?.startsWith('/data/app') && !isUpdatedSystemApp) {
    return `${packageName} claims to be a system app but is installed under /data/app`;
  }
  if (partition === 'DATA' && !isUpdatedSystemApp) {
    return `${packageName} claims to be a system app but lives on the data partition`;
  }
  return null;
}
