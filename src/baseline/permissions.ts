import { createHash } from 'node:crypto';
import { CLUSTERS, CLUSTER_NAMES } from '../catalog/clusters.js';

/** Permissions of every high-risk cluster, plus background location. */
export const HIGH_RISK_PERMISSIONS: ReadonlySet<string> = new Set<string>([
  ...CLUSTER_NAMES.filter((c) => CLUSTERS[c].isHighRisk).flatMap((c) => CLUSTERS[c].permissions),
  'android.permission.ACCESS_BACKGROUND_LOCATION',
]);

export function isHighRiskPermission(permission: string): boolean {
  return HIGH_RISK_PERMISSIONS.has(permission);
}

/** MD5 hex of the sorted, de-duplicated list joined by newlines. Empty list gives ''. */
export function permissionSetHash(permissions: readonly string[]): string {
  if (permissions.length === 0) return '';
  const normalized = [...new Set(permissions)].sort().join('\n');
  return createHash('md5').update(normalized, 'utf8').digest('hex');
}

export function highRiskSubset(permissions: readonly string[]): string[] {
  return [...new Set(permissions.filter(isHighRiskPermission))].sort();
}
