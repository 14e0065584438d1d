import type { AppCategory } from '../catalog/categories.js';
import type { CapabilityCluster, SpecialAccessSnapshot } from '../catalog/clusters.js';
import type { FindingHardness, FindingType, RawFinding } from '../catalog/findings.js';
import type { Severity } from '../catalog/severity.js';
import type { TrustEvidence } from '../evidence/types.js';

export type InstallClass = 'SYSTEM_PREINSTALLED' | 'USER_INSTALLED' | 'ENTERPRISE_MANAGED';

/** SYSTEM silences hygiene-only findings; HARD findings are never touched by either. */
export type PolicyProfile = 'SYSTEM' | 'USER';

export type EffectiveRisk = 'SAFE' | 'INFO' | 'NEEDS_ATTENTION' | 'CRITICAL';

export interface AdjustedFinding {
  findingType: FindingType;
  originalSeverity: Severity;
  adjustedSeverity: Severity;
  hardness: FindingHardness;
  wasDowngraded: boolean;
  title: string;
  description: string;
  /** Lower sorts first in explanations. */
  explainPriority: number;
}

export interface RiskInput {
  packageName: string;
  trustEvidence: TrustEvidence;
  rawFindings: readonly RawFinding[];
  grantedPermissions: readonly string[];
  category: AppCategory;
  isNewApp: boolean;
  specialAccess?: SpecialAccessSnapshot | null;
  installClass?: InstallClass;
  policyProfileOverride?: PolicyProfile;
  /** Permissions the category legitimately uses; only annotates privacyCapabilities. */
  expectedPermissions?: readonly string[];
}

/** Which link of the priority chain produced the verdict, 1 to 12. */
export type DecisionRule = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12;

export interface AppVerdict {
  packageName: string;
  trustScore: number;
  riskScore: number;
  effectiveRisk: EffectiveRisk;
  decisionRule: DecisionRule;
  adjustedFindings: AdjustedFinding[];
  activeClusters: CapabilityCluster[];
  unexpectedClusters: CapabilityCluster[];
  matchedCombos: string[];
  topReasons: string[];
  privacyCapabilities: string[];
  isSystemComponent: boolean;
  policyProfile: PolicyProfile;
  shouldShowInMainList: boolean;
}

export interface ScanSummary {
  totalApps: number;
  critical: number;
  needsAttention: number;
  info: number;
  safe: number;
  appsSecurityScore: number;
}
