import { z } from 'zod';
import { APP_CATEGORIES } from '../catalog/categories.js';
import { EVENT_TYPES, SIGNAL_SEVERITY_ORDER, SIGNAL_SOURCES, SIGNAL_TYPES, type AppFeatureVector } from './types.js';

export const SignalSeveritySchema = z.enum(SIGNAL_SEVERITY_ORDER);

export const SecuritySignalSchema = z.object({
  id: z.string().min(1),
  timestamp: z.number().int().nonnegative(),
  source: z.enum(SIGNAL_SOURCES),
  type: z.enum(SIGNAL_TYPES),
  severity: SignalSeveritySchema,
  packageName: z.string().nullable().default(null),
  summary: z.string().default(''),
  details: z.record(z.string()).default({}),
});

export const SecurityEventSchema = z.object({
  id: z.string().min(1),
  startTime: z.number().int().nonnegative(),
  endTime: z.number().int().nonnegative(),
  source: z.enum(SIGNAL_SOURCES),
  type: z.enum(EVENT_TYPES),
  severity: SignalSeveritySchema,
  packageName: z.string().nullable().default(null),
  summary: z.string().default(''),
  signals: z.array(SecuritySignalSchema).default([]),
  metadata: z.record(z.string()).default({}),
  isPromoted: z.boolean().default(false),
});

const ClusterSchema = z.enum([
  'SMS',
  'CALL_LOG',
  'ACCESSIBILITY',
  'OVERLAY',
  'INSTALL_PACKAGES',
  'VPN',
  'DEVICE_ADMIN',
  'NOTIFICATION_LISTENER',
  'BACKGROUND_LOCATION',
]);

/** Reads back a feature vector persisted as JSON next to its baseline. */
export const AppFeatureVectorSchema: z.ZodType<AppFeatureVector> = z.object({
  packageName: z.string().min(1),
  timestamp: z.number(),
  identity: z.object({
    trustScore: z.number(),
    trustLevel: z.enum(['HIGH', 'MODERATE', 'LOW', 'ANOMALOUS']),
    certSha256: z.string(),
    certMatchType: z.enum(['DEVELOPER_MATCH', 'APP_MATCH', 'CERT_MISMATCH', 'UNKNOWN']),
    matchedDeveloper: z.string().nullable(),
    installerType: z.enum([
      'PLAY_STORE',
      'SYSTEM_INSTALLER',
      'SAMSUNG_STORE',
      'HUAWEI_APPGALLERY',
      'AMAZON_APPSTORE',
      'MDM_INSTALLER',
      'SIDELOADED',
      'UNKNOWN',
    ]),
    installerPackage: z.string().nullable(),
    isSystemApp: z.boolean(),
    isPlatformSigned: z.boolean(),
    hasSigningLineage: z.boolean(),
    isNewApp: z.boolean(),
  }),
  change: z.object({
    baselineStatus: z.enum(['NEW', 'UNCHANGED', 'CHANGED', 'REMOVED']),
    isFirstScan: z.boolean(),
    anomalies: z.array(
      z.enum([
        'CERT_CHANGED',
        'NEW_SYSTEM_APP',
        'VERSION_CHANGED',
        'VERSION_ROLLBACK',
        'INSTALLER_CHANGED',
        'PARTITION_CHANGED',
        'PERMISSION_SET_CHANGED',
        'HIGH_RISK_PERMISSION_ADDED',
        'EXPORTED_SURFACE_INCREASED',
      ]),
    ),
    lastUpdateAt: z.number().nullable(),
    versionCode: z.number(),
    versionName: z.string().nullable(),
    isVersionRollback: z.boolean(),
  }),
  capability: z.object({
    activeHighRiskClusters: z.array(ClusterSchema),
    unexpectedClusters: z.array(ClusterSchema),
    dangerousPermissionCount: z.number(),
    highRiskPermissions: z.array(z.string()),
    privacyCapabilities: z.array(z.string()),
    matchedCombos: z.array(z.string()),
    appCategory: z.enum(APP_CATEGORIES),
  }),
  surface: z.object({
    exportedActivityCount: z.number(),
    exportedServiceCount: z.number(),
    exportedReceiverCount: z.number(),
    exportedProviderCount: z.number(),
    unprotectedExportedCount: z.number(),
    hasSuspiciousNativeLibs: z.boolean(),
    nativeLibCount: z.number(),
    targetSdk: z.number(),
    minSdk: z.number(),
    apkSizeBytes: z.number(),
  }),
  specialAccess: z.object({
    packageName: z.string(),
    accessibilityEnabled: z.boolean(),
    notificationListenerEnabled: z.boolean(),
    deviceAdminEnabled: z.boolean(),
    isDefaultSms: z.boolean(),
    isDefaultDialer: z.boolean(),
    overlayEnabled: z.boolean(),
    batteryOptimizationIgnored: z.boolean(),
  }),
  verdict: z.object({
    effectiveRisk: z.enum(['SAFE', 'INFO', 'NEEDS_ATTENTION', 'CRITICAL']),
    riskScore: z.number(),
    hardFindingCount: z.number(),
    softFindingCount: z.number(),
    topReasons: z.array(z.string()),
  }),
});
