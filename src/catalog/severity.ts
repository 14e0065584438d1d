export type Severity = 'NONE' | 'LOW' | 'MEDIUM' | 'HIGH' | 'CRITICAL';

/** Total order, lowest first. All comparisons go through this table. */
export const SEVERITY_ORDER: readonly Severity[] = ['NONE', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'];

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

export function isAtLeast(severity: Severity, threshold: Severity): boolean {
  return severityRank(severity) >= severityRank(threshold);
}

export function compareSeverity(a: Severity, b: Severity): number {
  return severityRank(a) - severityRank(b);
}

/** Lowers a severity by `levels`, bottoming out at NONE. */
export function downgrade(severity: Severity, levels: number): Severity {
  const rank = Math.max(0, severityRank(severity) - levels);
  return SEVERITY_ORDER[rank] ?? 'NONE';
}

export function maxSeverity(values: readonly Severity[]): Severity {
  let max: Severity = 'NONE';
  for (const value of values) {
    if (compareSeverity(value, max) > 0) max = value;
  }
  return max;
}
