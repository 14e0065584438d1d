import type { AppVerdict, ScanSummary } from './types.js';

export const CRITICAL_PENALTY = 20;
export const NEEDS_ATTENTION_PENALTY = 5;

/** Device-level rollup: 100 minus penalties for critical and attention-worthy apps. */
export function summarizeScan(verdicts: readonly AppVerdict[]): ScanSummary {
  const count = (risk: AppVerdict['effectiveRisk']): number =>
    verdicts.filter((v) => v.effectiveRisk === risk).length;

  const critical = count('CRITICAL');
  const needsAttention = count('NEEDS_ATTENTION');
  const score = 100 - CRITICAL_PENALTY * critical - NEEDS_ATTENTION_PENALTY * needsAttention;

  return {
    totalApps: verdicts.length,
    critical,
    needsAttention,
    info: count('INFO'),
    safe: count('SAFE'),
    appsSecurityScore: Math.min(100, Math.max(0, score)),
  };
}
