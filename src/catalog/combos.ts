import type { CapabilityCluster } from './clusters.js';
import type { Severity } from './severity.js';

export interface DangerousCombo {
  name: string;
  requiredClusters: readonly CapabilityCluster[];
  requiresLowTrust: boolean;
  requiresSideload: boolean;
  requiresDebugCert: boolean;
  /** When set, the combo is skipped if every required cluster is expected for the category. */
  respectCategoryWhitelist: boolean;
  severity: Severity;
}

export const LOW_TRUST_THRESHOLD = 40;

function combo(
  name: string,
  requiredClusters: CapabilityCluster[],
  severity: Severity,
  flags: Partial<Pick<DangerousCombo, 'requiresLowTrust' | 'requiresSideload' | 'requiresDebugCert' | 'respectCategoryWhitelist'>> = {},
): DangerousCombo {
  return {
    name,
    requiredClusters,
    requiresLowTrust: flags.requiresLowTrust ?? false,
    requiresSideload: flags.requiresSideload ?? false,
    requiresDebugCert: flags.requiresDebugCert ?? false,
    respectCategoryWhitelist: flags.respectCategoryWhitelist ?? true,
    severity,
  };
}

export const DANGEROUS_COMBOS: readonly DangerousCombo[] = [
  combo('Suspicious SMS access', ['SMS'], 'CRITICAL', {
    requiresSideload: true,
    requiresDebugCert: true,
  }),
  combo('Overlay with accessibility from sideload', ['OVERLAY', 'ACCESSIBILITY'], 'CRITICAL', {
    requiresSideload: true,
  }),
  combo('Dropper: accessibility and package installs', ['ACCESSIBILITY', 'INSTALL_PACKAGES'], 'CRITICAL', {
    requiresLowTrust: true,
  }),
  combo('Banking trojan: overlay and SMS', ['OVERLAY', 'SMS'], 'CRITICAL', {
    requiresLowTrust: true,
  }),
  combo('Sideloaded stalkerware', ['ACCESSIBILITY', 'NOTIFICATION_LISTENER'], 'CRITICAL', {
    requiresSideload: true,
    requiresLowTrust: true,
  }),
  combo('Stalkerware: accessibility and notification access', ['ACCESSIBILITY', 'NOTIFICATION_LISTENER'], 'HIGH', {
    requiresLowTrust: true,
  }),
  combo('SMS and call log harvesting', ['SMS', 'CALL_LOG'], 'HIGH', {
    requiresLowTrust: true,
  }),
  combo('Sideloaded VPN', ['VPN'], 'HIGH', {
    requiresSideload: true,
    requiresLowTrust: true,
    respectCategoryWhitelist: false,
  }),
  combo('Sideload with package installs', ['INSTALL_PACKAGES'], 'HIGH', {
    requiresSideload: true,
  }),
];

export interface ComboContext {
  activeClusters: readonly CapabilityCluster[];
  trustScore: number;
  isSideloaded: boolean;
  isDebugSigned: boolean;
  /** Clusters expected for the app's category at its trust level. */
  expectedClusters: readonly CapabilityCluster[];
}

/** Pure AND over every condition the combo declares. */
export function comboMatches(c: DangerousCombo, ctx: ComboContext): boolean {
  if (!c.requiredClusters.every((cl) => ctx.activeClusters.includes(cl))) return false;
  if (c.requiresLowTrust && !(ctx.trustScore < LOW_TRUST_THRESHOLD)) return false;
  if (c.requiresSideload && !ctx.isSideloaded) return false;
  if (c.requiresDebugCert && !ctx.isDebugSigned) return false;
  if (c.respectCategoryWhitelist && c.requiredClusters.every((cl) => ctx.expectedClusters.includes(cl))) {
    return false;
  }
  return true;
}

export function matchCombos(
  ctx: ComboContext,
  catalog: readonly DangerousCombo[] = DANGEROUS_COMBOS,
): DangerousCombo[] {
  return catalog.filter((c) => comboMatches(c, ctx));
}
