import { HYGIENE_FINDING_TYPES, hardnessOf, type FindingHardness, type RawFinding } from '../catalog/findings.js';
import { downgrade, severityRank, type Severity } from '../catalog/severity.js';
import { HIGH_TRUST_THRESHOLD, MODERATE_TRUST_THRESHOLD } from '../evidence/trust-evidence.js';
import type { AdjustedFinding, PolicyProfile } from './types.js';

const HARDNESS_TIER: Readonly<Record<FindingHardness, number>> = {
  HARD: 0,
  SOFT: 1,
  WEAK_SIGNAL: 2,
};

export function explainPriority(hardness: FindingHardness, severity: Severity): number {
  return HARDNESS_TIER[hardness] * 10 + (4 - severityRank(severity));
}

function adjustedSeverity(raw: RawFinding, hardness: FindingHardness, trustScore: number, profile: PolicyProfile): Severity {
  switch (hardness) {
    case 'HARD':
      return raw.severity;
    case 'SOFT':
    case 'WEAK_SIGNAL':
      if (profile === 'SYSTEM' && HYGIENE_FINDING_TYPES.has(raw.type)) return 'NONE';
      break;
  }

  if (hardness === 'WEAK_SIGNAL') {
    if (trustScore >= HIGH_TRUST_THRESHOLD) return 'NONE';
    if (trustScore >= MODERATE_TRUST_THRESHOLD) return downgrade(raw.severity, 2);
    return downgrade(raw.severity, 1);
  }

  if (trustScore >= HIGH_TRUST_THRESHOLD) return downgrade(raw.severity, 2);
  if (trustScore >= MODERATE_TRUST_THRESHOLD) return downgrade(raw.severity, 1);
  return raw.severity;
}

/** HARD findings always come back with their original severity. */
export function adjustFinding(raw: RawFinding, trustScore: number, profile: PolicyProfile): AdjustedFinding {
  const hardness = hardnessOf(raw.type);
  const adjusted = adjustedSeverity(raw, hardness, trustScore, profile);
  return {
    findingType: raw.type,
    originalSeverity: raw.severity,
    adjustedSeverity: adjusted,
    hardness,
    wasDowngraded: adjusted !== raw.severity,
    title: raw.title,
    description: raw.description,
    explainPriority: explainPriority(hardness, adjusted),
  };
}
