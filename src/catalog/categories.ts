import type { CapabilityCluster } from './clusters.js';

export const APP_CATEGORIES = [
  'SYSTEM_TELECOM',
  'SYSTEM_MESSAGING',
  'SYSTEM_FRAMEWORK',
  'SYSTEM_CONNECTIVITY',
  'VPN',
  'BANKING',
  'MESSAGING',
  'SOCIAL',
  'NAVIGATION',
  'CAMERA',
  'FITNESS',
  'BROWSER',
  'PHONE_DIALER',
  'SECURITY',
  'LAUNCHER',
  'ACCESSIBILITY_TOOL',
  'GAME',
  'UTILITY',
  'KEYBOARD',
  'OTHER',
] as const;

export type AppCategory = (typeof APP_CATEGORIES)[number];

/**
 * One way of recognising a category. Every field that is present must match;
 * within a field any listed value is enough.
 */
export interface CategoryMatcher {
  packageEquals?: string[];
  packageContains?: string[];
  packageStartsWith?: string[];
  nameContains?: string[];
}

export interface CategoryRule {
  category: AppCategory;
  match: CategoryMatcher[];
}

/** Loaded once at start-up from the categories data file and passed by reference. */
export interface CategoryCatalog {
  rules: CategoryRule[];
  expectedPermissions: Partial<Record<AppCategory, string[]>>;
}

export const ACCESSIBILITY_TOOL_MIN_TRUST = 40;

/** Clusters a category legitimately needs. Categories not listed expect nothing. */
export const CATEGORY_CLUSTER_WHITELIST: Readonly<Partial<Record<AppCategory, readonly CapabilityCluster[]>>> = {
  PHONE_DIALER: ['SMS', 'CALL_LOG'],
  VPN: ['VPN'],
  ACCESSIBILITY_TOOL: ['ACCESSIBILITY'],
  NAVIGATION: ['BACKGROUND_LOCATION'],
  FITNESS: ['BACKGROUND_LOCATION'],
  SYSTEM_TELECOM: ['SMS', 'CALL_LOG', 'NOTIFICATION_LISTENER', 'BACKGROUND_LOCATION'],
  SYSTEM_MESSAGING: ['SMS'],
  SYSTEM_FRAMEWORK: ['OVERLAY', 'ACCESSIBILITY', 'NOTIFICATION_LISTENER', 'DEVICE_ADMIN', 'INSTALL_PACKAGES'],
  SYSTEM_CONNECTIVITY: ['VPN', 'BACKGROUND_LOCATION'],
};

function matches(matcher: CategoryMatcher, pkg: string, name: string): boolean {
  const checks: boolean[] = [];
  if (matcher.packageEquals) checks.push(matcher.packageEquals.includes(pkg));
  if (matcher.packageContains) checks.push(matcher.packageContains.some((s) => pkg.includes(s)));
  if (matcher.packageStartsWith) checks.push(matcher.packageStartsWith.some((s) => pkg.startsWith(s)));
  if (matcher.nameContains) checks.push(matcher.nameContains.some((s) => name.includes(s)));
  return checks.length > 0 && checks.every(Boolean);
}

/** First matching rule wins; rule order in the catalog is significant. */
export function detectCategory(
  catalog: CategoryCatalog,
  packageName: string,
  appName?: string | null,
): AppCategory {
  const pkg = packageName.toLowerCase();
  const name = (appName ?? '').toLowerCase();
  for (const rule of catalog.rules) {
    if (rule.match.some((m) => matches(m, pkg, name))) return rule.category;
  }
  return 'OTHER';
}

export function expectedClusters(category: AppCategory, trustScore: number): readonly CapabilityCluster[] {
  if (category === 'ACCESSIBILITY_TOOL' && trustScore < ACCESSIBILITY_TOOL_MIN_TRUST) return [];
  return CATEGORY_CLUSTER_WHITELIST[category] ?? [];
}

export function isClusterExpected(
  category: AppCategory,
  cluster: CapabilityCluster,
  trustScore: number,
): boolean {
  return expectedClusters(category, trustScore).includes(cluster);
}

export function isPermissionExpected(
  catalog: CategoryCatalog,
  category: AppCategory,
  permission: string,
): boolean {
  return (catalog.expectedPermissions[category] ?? []).includes(permission);
}
