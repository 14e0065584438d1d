import type { AnomalyType, BaselineStatus } from '../baseline/types.js';
import type { AppCategory } from '../catalog/categories.js';
import type { CapabilityCluster, SpecialAccessSnapshot } from '../catalog/clusters.js';
import type { CertMatchType, InstallerType, TrustLevel } from '../evidence/types.js';
import type { EffectiveRisk } from '../risk/types.js';

export const SIGNAL_SOURCES = [
  'APP_SCANNER',
  'BASELINE',
  'SPECIAL_ACCESS',
  'CONFIG_BASELINE',
  'TRUST_ENGINE',
  'DEVICE_ANALYZER',
] as const;
export type SignalSource = (typeof SIGNAL_SOURCES)[number];

export const SIGNAL_TYPES = [
  // app level
  'CERT_CHANGE',
  'VERSION_CHANGE',
  'VERSION_ROLLBACK',
  'INSTALLER_CHANGE',
  'PARTITION_CHANGE',
  'PERMISSION_SET_CHANGE',
  'HIGH_RISK_PERM_ADDED',
  'SPECIAL_ACCESS_ENABLED',
  'SPECIAL_ACCESS_DISABLED',
  'EXPORTED_SURFACE_CHANGE',
  'NEW_APP_INSTALLED',
  'APP_REMOVED',
  'SUSPICIOUS_NATIVE_LIB',
  'DEBUG_SIGNATURE',
  'COMBO_DETECTED',
  // device config
  'USER_CA_CERT_ADDED',
  'USER_CA_CERT_REMOVED',
  'PRIVATE_DNS_CHANGED',
  'VPN_STATE_CHANGED',
  'WIFI_PROXY_DETECTED',
  'UNKNOWN_ACCESSIBILITY_SERVICE',
  'DEFAULT_APP_CHANGED',
  'DEVELOPER_OPTIONS_ENABLED',
  'USB_DEBUGGING_ENABLED',
  'UNKNOWN_SOURCES_ENABLED',
  // device integrity
  'ROOT_DETECTED',
  'BOOTLOADER_UNLOCKED',
  // post-install behaviour
  'DYNAMIC_CODE_LOADING',
  'FRESH_INSTALL_RISKY_PERM',
  'NETWORK_AFTER_INSTALL',
  'NETWORK_BURST_ANOMALY',
  'STAGED_PAYLOAD_PATTERN',
  'BOOT_PERSISTENCE',
  'POST_INSTALL_PERMISSION_ESCALATION',
] as const;
export type SignalType = (typeof SIGNAL_TYPES)[number];

/** Distinct from the finding Severity: signals have INFO and never NONE. Lowest first. */
export const SIGNAL_SEVERITY_ORDER = ['INFO', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export type SignalSeverity = (typeof SIGNAL_SEVERITY_ORDER)[number];

export const SIGNAL_SEVERITY_WEIGHT: Readonly<Record<SignalSeverity, number>> = {
  CRITICAL: 40,
  HIGH: 25,
  MEDIUM: 15,
  LOW: 5,
  INFO: 1,
};

export interface SecuritySignal {
  id: string;
  timestamp: number;
  source: SignalSource;
  type: SignalType;
  severity: SignalSeverity;
  /** Null for device-wide signals. */
  packageName: string | null;
  summary: string;
  details: Record<string, string>;
}

export const EVENT_TYPES = [
  'SUSPICIOUS_UPDATE',
  'SUSPICIOUS_INSTALL',
  'CAPABILITY_ESCALATION',
  'SPECIAL_ACCESS_GRANT',
  'STALKERWARE_PATTERN',
  'DROPPER_PATTERN',
  'OVERLAY_ATTACK_PATTERN',
  'STAGED_PAYLOAD',
  'LOADER_BEHAVIOR',
  'CONFIG_TAMPER',
  'CA_CERT_INSTALLED',
  'SUSPICIOUS_VPN',
  'DEVICE_COMPROMISE',
  'OTHER',
] as const;
export type EventType = (typeof EVENT_TYPES)[number];

export interface SecurityEvent {
  id: string;
  startTime: number;
  endTime: number;
  source: SignalSource;
  type: EventType;
  severity: SignalSeverity;
  packageName: string | null;
  summary: string;
  signals: SecuritySignal[];
  metadata: Record<string, string>;
  isPromoted: boolean;
}

export type IncidentSeverity = SignalSeverity;

export const INCIDENT_STATUSES = ['OPEN', 'INVESTIGATING', 'RESOLVED', 'DISMISSED', 'FALSE_POSITIVE'] as const;
export type IncidentStatus = (typeof INCIDENT_STATUSES)[number];

export interface Hypothesis {
  name: string;
  description: string;
  /** Always within [0, 1]. */
  confidence: number;
  supportingEvidence: string[];
  contradictingEvidence: string[];
  /** MITRE ATT&CK for Mobile technique IDs. */
  mitreTechniques: string[];
}

export type ActionCategory =
  | 'UNINSTALL'
  | 'DISABLE'
  | 'REVOKE_PERMISSION'
  | 'REVOKE_SPECIAL_ACCESS'
  | 'CHECK_SETTINGS'
  | 'REINSTALL_FROM_STORE'
  | 'FACTORY_RESET'
  | 'MONITOR'
  | 'INFORM';

export interface RecommendedAction {
  priority: number;
  type: ActionCategory;
  title: string;
  description: string;
  targetPackage: string | null;
}

export interface SecurityIncident {
  id: string;
  createdAt: number;
  updatedAt: number;
  severity: IncidentSeverity;
  status: IncidentStatus;
  title: string;
  summary: string;
  packageName: string | null;
  affectedPackages: string[];
  events: SecurityEvent[];
  hypotheses: Hypothesis[];
  recommendedActions: RecommendedAction[];
}

export interface IdentityFeatures {
  trustScore: number;
  trustLevel: TrustLevel;
  certSha256: string;
  certMatchType: CertMatchType;
  matchedDeveloper: string | null;
  installerType: InstallerType;
  installerPackage: string | null;
  isSystemApp: boolean;
  isPlatformSigned: boolean;
  hasSigningLineage: boolean;
  isNewApp: boolean;
}

export interface ChangeFeatures {
  baselineStatus: BaselineStatus;
  isFirstScan: boolean;
  anomalies: AnomalyType[];
  lastUpdateAt: number | null;
  versionCode: number;
  versionName: string | null;
  isVersionRollback: boolean;
}

export interface CapabilityFeatures {
  activeHighRiskClusters: CapabilityCluster[];
  unexpectedClusters: CapabilityCluster[];
  dangerousPermissionCount: number;
  highRiskPermissions: string[];
  privacyCapabilities: string[];
  matchedCombos: string[];
  appCategory: AppCategory;
}

export interface SurfaceFeatures {
  exportedActivityCount: number;
  exportedServiceCount: number;
  exportedReceiverCount: number;
  exportedProviderCount: number;
  unprotectedExportedCount: number;
  hasSuspiciousNativeLibs: boolean;
  nativeLibCount: number;
  targetSdk: number;
  minSdk: number;
  apkSizeBytes: number;
}

export interface VerdictSummary {
  effectiveRisk: EffectiveRisk;
  riskScore: number;
  hardFindingCount: number;
  softFindingCount: number;
  topReasons: string[];
}

/** Everything known about one app after a scan, in one read-only record. */
export interface AppFeatureVector {
  packageName: string;
  timestamp: number;
  identity: IdentityFeatures;
  change: ChangeFeatures;
  capability: CapabilityFeatures;
  surface: SurfaceFeatures;
  specialAccess: SpecialAccessSnapshot;
  verdict: VerdictSummary;
}
