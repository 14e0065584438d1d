import { expectedClusters } from '../catalog/categories.js';
import {
  DANGEROUS_CLUSTERS,
  activeClusters as computeActiveClusters,
  isHighRiskCluster,
  type CapabilityCluster,
} from '../catalog/clusters.js';
import { matchCombos, LOW_TRUST_THRESHOLD, type DangerousCombo } from '../catalog/combos.js';
import {
  BASELINE_DELTA_FINDING_TYPES,
  HYGIENE_FINDING_TYPES,
  type FindingType,
  type RawFinding,
} from '../catalog/findings.js';
import { isAtLeast, severityRank, type Severity } from '../catalog/severity.js';
import { HIGH_TRUST_THRESHOLD } from '../evidence/trust-evidence.js';
import { adjustFinding } from './adjust.js';
import { INFO_THRESHOLD, profileFor } from './policy.js';
import type {
  AdjustedFinding,
  AppVerdict,
  DecisionRule,
  EffectiveRisk,
  PolicyProfile,
  RiskInput,
} from './types.js';

type ScoredSeverity = Exclude<Severity, 'NONE'>;

const HARD_POINTS: Readonly<Record<ScoredSeverity, number>> = { CRITICAL: 30, HIGH: 20, MEDIUM: 10, LOW: 5 };
const SOFT_POINTS: Readonly<Record<ScoredSeverity, number>> = { CRITICAL: 15, HIGH: 10, MEDIUM: 5, LOW: 2 };
const COMBO_POINTS: Readonly<Record<ScoredSeverity, number>> = { CRITICAL: 40, HIGH: 25, MEDIUM: 15, LOW: 5 };

const HARD_WEIGHT = 10;
const SOFT_WEIGHT = 3;
const WEAK_WEIGHT = 1;

const MAX_REASONS: Readonly<Record<EffectiveRisk, number>> = {
  CRITICAL: 3,
  NEEDS_ATTENTION: 2,
  INFO: 0,
  SAFE: 0,
};

const PRIVACY_PERMISSIONS: readonly (readonly [string, string])[] = [
  ['android.permission.CAMERA', 'camera'],
  ['android.permission.RECORD_AUDIO', 'microphone'],
  ['android.permission.READ_CONTACTS', 'contacts'],
  ['android.permission.ACCESS_FINE_LOCATION', 'precise location'],
  ['android.permission.ACCESS_COARSE_LOCATION', 'approximate location'],
];

/** Extra-signal finding types that turn a low-trust unexpected cluster into a real concern. */
const EXTRA_SIGNAL_TYPES: ReadonlySet<FindingType> = new Set<FindingType>([
  ...BASELINE_DELTA_FINDING_TYPES,
  'SUSPICIOUS_NATIVE_LIB',
  'INSTALLER_ANOMALY',
  'EXPORTED_SURFACE_INCREASED',
]);

function points(table: Readonly<Record<ScoredSeverity, number>>, severity: Severity): number {
  return severity === 'NONE' ? 0 : table[severity];
}

export function calculateRiskScore(findings: readonly AdjustedFinding[], combos: readonly DangerousCombo[]): number {
  let score = 0;
  for (const f of findings) {
    if (f.hardness === 'HARD') score += points(HARD_POINTS, f.adjustedSeverity);
    else if (f.hardness === 'SOFT') score += points(SOFT_POINTS, f.adjustedSeverity);
  }
  for (const c of combos) score += points(COMBO_POINTS, c.severity);
  return Math.min(100, Math.max(0, score));
}

function weightedFindingSum(findings: readonly AdjustedFinding[], profile: PolicyProfile): number {
  let sum = 0;
  for (const f of findings) {
    if (f.adjustedSeverity === 'NONE') continue;
    switch (f.hardness) {
      case 'HARD':
        sum += HARD_WEIGHT;
        break;
      case 'SOFT':
        sum += HYGIENE_FINDING_TYPES.has(f.findingType) && profile === 'SYSTEM' ? 0 : SOFT_WEIGHT;
        break;
      case 'WEAK_SIGNAL':
        sum += profile === 'SYSTEM' ? 0 : WEAK_WEIGHT;
        break;
    }
  }
  return sum;
}

interface DecisionContext {
  input: RiskInput;
  adjusted: readonly AdjustedFinding[];
  combos: readonly DangerousCombo[];
  active: readonly CapabilityCluster[];
  unexpected: readonly CapabilityCluster[];
  profile: PolicyProfile;
}

function has(findings: readonly RawFinding[], type: FindingType): boolean {
  return findings.some((f) => f.type === type);
}

/** Strict first-match chain. The order of the checks is the policy. */
function decide(ctx: DecisionContext): [EffectiveRisk, DecisionRule] {
  const { input, adjusted, combos, active, unexpected, profile } = ctx;
  const evidence = input.trustEvidence;
  const trust = evidence.trustScore;
  const lowTrust = trust < LOW_TRUST_THRESHOLD;
  const sideloaded = evidence.installerInfo.installerType === 'SIDELOADED';

  if (adjusted.some((f) => f.hardness === 'HARD' && isAtLeast(f.adjustedSeverity, 'MEDIUM'))) return ['CRITICAL', 1];
  if (evidence.trustLevel === 'ANOMALOUS') return ['CRITICAL', 2];
  if (combos.some((c) => isAtLeast(c.severity, 'CRITICAL'))) return ['CRITICAL', 3];
  if (combos.some((c) => isAtLeast(c.severity, 'HIGH'))) return ['NEEDS_ATTENTION', 4];

  if (
    has(input.rawFindings, 'INSTALLER_ANOMALY') &&
    sideloaded &&
    active.some((c) => DANGEROUS_CLUSTERS.has(c))
  ) {
    return ['NEEDS_ATTENTION', 5];
  }

  const permissionAdded = has(input.rawFindings, 'HIGH_RISK_PERMISSION_ADDED');
  if (permissionAdded && lowTrust) return ['NEEDS_ATTENTION', 6];

  const extraSignal =
    input.rawFindings.some((f) => EXTRA_SIGNAL_TYPES.has(f.type)) || sideloaded || input.isNewApp;
  if (lowTrust && unexpected.length > 0 && extraSignal) return ['NEEDS_ATTENTION', 7];

  if (permissionAdded) return ['INFO', 8];
  if (has(input.rawFindings, 'EXPORTED_SURFACE_INCREASED') && lowTrust) return ['INFO', 9];
  if (unexpected.length > 0 && trust < HIGH_TRUST_THRESHOLD) return ['INFO', 10];
  if (weightedFindingSum(adjusted, profile) >= INFO_THRESHOLD[profile]) return ['INFO', 11];
  return ['SAFE', 12];
}

function topReasons(
  risk: EffectiveRisk,
  combos: readonly DangerousCombo[],
  adjusted: readonly AdjustedFinding[],
): string[] {
  const limit = MAX_REASONS[risk];
  if (limit === 0) return [];
  const byPriority = (a: AdjustedFinding, b: AdjustedFinding): number => a.explainPriority - b.explainPriority;
  const visible = adjusted.filter((f) => f.adjustedSeverity !== 'NONE');
  const comboNames = [...combos]
    .sort((a, b) => severityRank(b.severity) - severityRank(a.severity))
    .map((c) => c.name);
  const hard = visible.filter((f) => f.hardness === 'HARD').sort(byPriority).map((f) => f.title);
  const soft = visible.filter((f) => f.hardness === 'SOFT').sort(byPriority).map((f) => f.title);
  return [...comboNames, ...hard, ...soft].slice(0, limit);
}

function privacyCapabilities(granted: readonly string[], expected: readonly string[]): string[] {
  return PRIVACY_PERMISSIONS.filter(([perm]) => granted.includes(perm)).map(([perm, label]) =>
    expected.includes(perm) ? `${label} (expected)` : label,
  );
}

/**
 * Turns trust evidence and raw findings into a verdict. Pure and
 * deterministic: identical input always gives an identical verdict.
 */
export function evaluate(input: RiskInput): AppVerdict {
  const evidence = input.trustEvidence;
  const trust = evidence.trustScore;
  const profile = input.policyProfileOverride ?? profileFor(input.installClass ?? 'USER_INSTALLED');

  // Step B: a toggleable cluster needs the service really enabled, when we know.
  const active = computeActiveClusters(input.grantedPermissions, input.specialAccess);
  const expected = expectedClusters(input.category, trust);
  const unexpected = active.filter((c) => isHighRiskCluster(c) && !expected.includes(c));

  // Step C
  const combos = matchCombos({
    activeClusters: active,
    trustScore: trust,
    isSideloaded: evidence.installerInfo.installerType === 'SIDELOADED',
    isDebugSigned: has(input.rawFindings, 'DEBUG_SIGNATURE'),
    expectedClusters: expected,
  });

  // Step D
  const adjusted = input.rawFindings.map((f) => adjustFinding(f, trust, profile));

  // Step E
  const [effectiveRisk, decisionRule] = decide({ input, adjusted, combos, active, unexpected, profile });

  const isSystemComponent = evidence.systemAppInfo.isSystemApp;
  const shouldShowInMainList = isSystemComponent
    ? adjusted.some((f) => f.hardness === 'HARD' && f.adjustedSeverity !== 'NONE') || effectiveRisk === 'CRITICAL'
    : effectiveRisk !== 'SAFE';

  return {
    packageName: input.packageName,
    trustScore: trust,
    riskScore: calculateRiskScore(adjusted, combos),
    effectiveRisk,
    decisionRule,
    adjustedFindings: adjusted,
    activeClusters: [...active],
    unexpectedClusters: unexpected,
    matchedCombos: combos.map((c) => c.name),
    topReasons: topReasons(effectiveRisk, combos, adjusted),
    privacyCapabilities: privacyCapabilities(input.grantedPermissions, input.expectedPermissions ?? []),
    isSystemComponent,
    policyProfile: profile,
    shouldShowInMainList,
  };
}
