import type { Severity } from '../catalog/severity.js';

/**
 * Persisted per-package row. Field names are a stable contract with the
 * storage layer and with the comparison logic.
 */
export interface BaselineRecord {
  packageName: string;
  certSha256: string;
  previousCertSha256: string | null;
  versionCode: number;
  versionName: string | null;
  isSystemApp: boolean;
  installerPackage: string | null;
  apkPath: string | null;
  firstSeenAt: number;
  lastSeenAt: number;
  lastCertChangeAt: number | null;
  scanCount: number;
  permissionSetHash: string;
  highRiskPermissions: string[];
  exportedActivityCount: number;
  exportedServiceCount: number;
  exportedReceiverCount: number;
  exportedProviderCount: number;
  unprotectedExportedCount: number;
}

/** The current observation of an app, in the shape the baseline compares. */
export type BaselineSnapshot = Omit<
  BaselineRecord,
  'previousCertSha256' | 'firstSeenAt' | 'lastSeenAt' | 'lastCertChangeAt' | 'scanCount'
>;

export type BaselineStatus = 'NEW' | 'UNCHANGED' | 'CHANGED' | 'REMOVED';

export type AnomalyType =
  | 'CERT_CHANGED'
  | 'NEW_SYSTEM_APP'
  | 'VERSION_CHANGED'
  | 'VERSION_ROLLBACK'
  | 'INSTALLER_CHANGED'
  | 'PARTITION_CHANGED'
  | 'PERMISSION_SET_CHANGED'
  | 'HIGH_RISK_PERMISSION_ADDED'
  | 'EXPORTED_SURFACE_INCREASED';

export type AnomalySeverity = Exclude<Severity, 'NONE'>;

export interface BaselineAnomaly {
  type: AnomalyType;
  severity: AnomalySeverity;
  description: string;
  details: string | null;
}

export interface BaselineComparison {
  packageName: string;
  status: BaselineStatus;
  anomalies: BaselineAnomaly[];
  isFirstScan: boolean;
  scanCount: number;
}

export interface BaselineContext {
  /** Whether any package already has a baseline on this device. */
  hasAnyBaseline: boolean;
}
