import type { Severity } from './severity.js';

export type FindingHardness = 'HARD' | 'SOFT' | 'WEAK_SIGNAL';

export type FindingType =
  // integrity and provenance
  | 'DEBUG_SIGNATURE'
  | 'SIGNATURE_MISMATCH'
  | 'BASELINE_SIGNATURE_CHANGE'
  | 'BASELINE_NEW_SYSTEM_APP'
  | 'INTEGRITY_FAIL_WITH_HOOKING'
  | 'INSTALLER_ANOMALY'
  | 'VERSION_ROLLBACK'
  | 'HIGH_RISK_PERMISSION_ADDED'
  | 'SIGNATURE_DRIFT'
  | 'PARTITION_ANOMALY'
  // hygiene and context
  | 'OVER_PRIVILEGED'
  | 'OLD_TARGET_SDK'
  | 'SUSPICIOUS_NATIVE_LIB'
  | 'EXPORTED_SURFACE_INCREASED'
  | 'VERSION_ROLLBACK_TRUSTED'
  | 'NOT_PLAY_SIGNED'
  | 'CRITICAL_PERMISSION'
  // weak signals
  | 'EXPORTED_COMPONENTS'
  | 'HIGH_RISK_CAPABILITY'
  | 'INSTALLER_ANOMALY_VERIFIED';

/**
 * Hardness is a property of the type, never of context. Typed as a full
 * Record so a new FindingType does not compile until it is classified here.
 */
export const FINDING_HARDNESS: Readonly<Record<FindingType, FindingHardness>> = {
  DEBUG_SIGNATURE: 'HARD',
  SIGNATURE_MISMATCH: 'HARD',
  BASELINE_SIGNATURE_CHANGE: 'HARD',
  BASELINE_NEW_SYSTEM_APP: 'HARD',
  INTEGRITY_FAIL_WITH_HOOKING: 'HARD',
  INSTALLER_ANOMALY: 'HARD',
  VERSION_ROLLBACK: 'HARD',
  HIGH_RISK_PERMISSION_ADDED: 'HARD',
  SIGNATURE_DRIFT: 'HARD',
  PARTITION_ANOMALY: 'HARD',
  OVER_PRIVILEGED: 'SOFT',
  OLD_TARGET_SDK: 'SOFT',
  SUSPICIOUS_NATIVE_LIB: 'SOFT',
  EXPORTED_SURFACE_INCREASED: 'SOFT',
  VERSION_ROLLBACK_TRUSTED: 'SOFT',
  NOT_PLAY_SIGNED: 'SOFT',
  CRITICAL_PERMISSION: 'SOFT',
  EXPORTED_COMPONENTS: 'WEAK_SIGNAL',
  HIGH_RISK_CAPABILITY: 'WEAK_SIGNAL',
  INSTALLER_ANOMALY_VERIFIED: 'WEAK_SIGNAL',
};

export function isFindingType(value: string): value is FindingType {
  return Object.prototype.hasOwnProperty.call(FINDING_HARDNESS, value);
}

export const FINDING_TYPES: readonly FindingType[] = Object.keys(FINDING_HARDNESS).filter(isFindingType);

/** SOFT/WEAK types that say nothing about compromise, only about app hygiene. */
export const HYGIENE_FINDING_TYPES: ReadonlySet<FindingType> = new Set<FindingType>([
  'OLD_TARGET_SDK',
  'OVER_PRIVILEGED',
  'EXPORTED_COMPONENTS',
  'NOT_PLAY_SIGNED',
  'INSTALLER_ANOMALY_VERIFIED',
  'HIGH_RISK_CAPABILITY',
]);

/** Findings that describe drift against the stored baseline. */
export const BASELINE_DELTA_FINDING_TYPES: ReadonlySet<FindingType> = new Set<FindingType>([
  'BASELINE_SIGNATURE_CHANGE',
  'BASELINE_NEW_SYSTEM_APP',
  'VERSION_ROLLBACK',
  'VERSION_ROLLBACK_TRUSTED',
  'HIGH_RISK_PERMISSION_ADDED',
]);

export function hardnessOf(type: FindingType): FindingHardness {
  return FINDING_HARDNESS[type];
}

export interface RawFinding {
  type: FindingType;
  severity: Severity;
  title: string;
  description: string;
}
