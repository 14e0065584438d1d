export {
  SEVERITY_ORDER,
  severityRank,
  isAtLeast,
  compareSeverity,
  downgrade,
  maxSeverity,
} from './severity.js';
export type { Severity } from './severity.js';
export {
  FINDING_HARDNESS,
  FINDING_TYPES,
  HYGIENE_FINDING_TYPES,
  BASELINE_DELTA_FINDING_TYPES,
  hardnessOf,
  isFindingType,
} from './findings.js';
export type { FindingHardness, FindingType, RawFinding } from './findings.js';
export {
  CLUSTERS,
  CLUSTER_NAMES,
  DANGEROUS_CLUSTERS,
  isHighRiskCluster,
  isClusterActive,
  activeClusters,
  emptySpecialAccess,
  hasAnySpecialAccess,
  activeSpecialAccessLabels,
} from './clusters.js';
export type { CapabilityCluster, ClusterDefinition, SpecialAccessSnapshot } from './clusters.js';
export {
  APP_CATEGORIES,
  ACCESSIBILITY_TOOL_MIN_TRUST,
  CATEGORY_CLUSTER_WHITELIST,
  detectCategory,
  expectedClusters,
  isClusterExpected,
  isPermissionExpected,
} from './categories.js';
export type { AppCategory, CategoryMatcher, CategoryRule, CategoryCatalog } from './categories.js';
export { DANGEROUS_COMBOS, LOW_TRUST_THRESHOLD, comboMatches, matchCombos } from './combos.js';
export type { DangerousCombo, ComboContext } from './combos.js';
