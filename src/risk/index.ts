export { evaluate, calculateRiskScore } from './evaluate.js';
export { adjustFinding, explainPriority } from './adjust.js';
export { classifyInstall, profileFor, INFO_THRESHOLD } from './policy.js';
export { deriveFindings, DANGEROUS_PERMISSIONS } from './derive-findings.js';
export type { FindingContext } from './derive-findings.js';
export { summarizeScan } from './summary.js';
export type {
  AdjustedFinding,
  AppVerdict,
  DecisionRule,
  EffectiveRisk,
  InstallClass,
  PolicyProfile,
  RiskInput,
  ScanSummary,
} from './types.js';
