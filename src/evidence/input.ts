import { z } from 'zod';

/**
 * Shapes the collectors hand to the engine. Every field except the package
 * name is optional on the wire and gets a neutral default, so partial
 * evidence never makes the engine throw.
 */

export const PartitionSchema = z.enum(['SYSTEM', 'VENDOR', 'PRODUCT', 'DATA', 'UNKNOWN']);
export type Partition = z.infer<typeof PartitionSchema>;

export const VerifiedBootStateSchema = z.enum(['GREEN', 'YELLOW', 'ORANGE', 'RED', 'UNKNOWN']);
export type VerifiedBootState = z.infer<typeof VerifiedBootStateSchema>;

export const NativeLibSuspicionSchema = z.enum(['HOOKING', 'ROOT_TOOL', 'PACKER', 'OBFUSCATED', 'OTHER']);
export type NativeLibSuspicion = z.infer<typeof NativeLibSuspicionSchema>;

export const NativeLibFindingSchema = z.object({
  name: z.string(),
  isSuspicious: z.boolean().default(false),
  suspicionType: NativeLibSuspicionSchema.nullable().default(null),
});
export type NativeLibFinding = z.infer<typeof NativeLibFindingSchema>;

export const ScannedAppEvidenceSchema = z.object({
  packageName: z.string().min(1),
  appName: z.string().nullable().default(null),
  /** Uppercase hex SHA-256 of the signing certificate; "UNKNOWN" when unreadable. */
  certSha256: z.string().min(1).default('UNKNOWN'),
  versionCode: z.number().int().nonnegative().default(0),
  versionName: z.string().nullable().default(null),
  isSystemApp: z.boolean().default(false),
  isPrivilegedApp: z.boolean().default(false),
  isUpdatedSystemApp: z.boolean().default(false),
  isApex: z.boolean().default(false),
  isPlatformSigned: z.boolean().default(false),
  installerPackage: z.string().nullable().default(null),
  apkPath: z.string().nullable().default(null),
  /** Overrides the partition derived from apkPath when the collector knows better. */
  partition: PartitionSchema.nullable().default(null),
  requestedPermissions: z.array(z.string()).default([]),
  grantedPermissions: z.array(z.string()).default([]),
  exportedActivityCount: z.number().int().nonnegative().default(0),
  exportedServiceCount: z.number().int().nonnegative().default(0),
  exportedReceiverCount: z.number().int().nonnegative().default(0),
  exportedProviderCount: z.number().int().nonnegative().default(0),
  unprotectedExportedCount: z.number().int().nonnegative().default(0),
  nativeLibFindings: z.array(NativeLibFindingSchema).default([]),
  targetSdk: z.number().int().nonnegative().default(0),
  minSdk: z.number().int().nonnegative().default(0),
  apkSizeBytes: z.number().int().nonnegative().default(0),
  isDebugSigned: z.boolean().default(false),
  hasSigningLineage: z.boolean().default(false),
  signingLineageLength: z.number().int().nonnegative().default(0),
  firstInstallTime: z.number().int().nullable().default(null),
  lastUpdateTime: z.number().int().nullable().default(null),
});
export type ScannedAppEvidence = z.infer<typeof ScannedAppEvidenceSchema>;
export type ScannedAppEvidenceInput = z.input<typeof ScannedAppEvidenceSchema>;

export const DeviceIntegrityEvidenceSchema = z.object({
  isRooted: z.boolean().default(false),
  verifiedBootState: VerifiedBootStateSchema.default('UNKNOWN'),
});
export type DeviceIntegrityEvidence = z.infer<typeof DeviceIntegrityEvidenceSchema>;

export const SpecialAccessSnapshotSchema = z.object({
  packageName: z.string().min(1),
  accessibilityEnabled: z.boolean().default(false),
  notificationListenerEnabled: z.boolean().default(false),
  deviceAdminEnabled: z.boolean().default(false),
  isDefaultSms: z.boolean().default(false),
  isDefaultDialer: z.boolean().default(false),
  overlayEnabled: z.boolean().default(false),
  batteryOptimizationIgnored: z.boolean().default(false),
});

export const PrivateDnsModeSchema = z.enum(['off', 'opportunistic', 'hostname', 'unknown']);

export const ConfigSnapshotSchema = z.object({
  userCaCertFingerprints: z.array(z.string()).default([]),
  privateDnsMode: PrivateDnsModeSchema.default('unknown'),
  privateDnsHostname: z.string().nullable().default(null),
  vpnActive: z.boolean().default(false),
  vpnPackageName: z.string().nullable().default(null),
  globalProxyConfigured: z.boolean().default(false),
  proxyHost: z.string().nullable().default(null),
  proxyPort: z.number().int().nullable().default(null),
  enabledAccessibilityServices: z.array(z.string()).default([]),
  enabledNotificationListeners: z.array(z.string()).default([]),
  defaultSmsApp: z.string().nullable().default(null),
  defaultDialerApp: z.string().nullable().default(null),
  developerOptionsEnabled: z.boolean().default(false),
  usbDebuggingEnabled: z.boolean().default(false),
  installUnknownSourcesEnabled: z.boolean().default(false),
  capturedAt: z.number().int().nonnegative().default(0),
});
export type ConfigSnapshot = z.infer<typeof ConfigSnapshotSchema>;
