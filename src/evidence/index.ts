export {
  collectEvidence,
  verifyCertificate,
  trustLevelFor,
  TRUST_WEIGHTS,
  HIGH_TRUST_THRESHOLD,
  MODERATE_TRUST_THRESHOLD,
  UNKNOWN_CERT,
} from './trust-evidence.js';
export {
  classifyInstaller,
  checkInstaller,
  isExpectedInstallerType,
  partitionFromPath,
  installerLabel,
} from './installer.js';
export {
  classifySignerDomain,
  isExpectedSignerMismatch,
  certPrefix,
  matchDeveloperCert,
  detectPartitionAnomaly,
} from './signer-domain.js';
export {
  ScannedAppEvidenceSchema,
  DeviceIntegrityEvidenceSchema,
  SpecialAccessSnapshotSchema,
  ConfigSnapshotSchema,
} from './input.js';
export type {
  ScannedAppEvidence,
  ScannedAppEvidenceInput,
  DeviceIntegrityEvidence,
  ConfigSnapshot,
  NativeLibFinding,
  NativeLibSuspicion,
  Partition,
  VerifiedBootState,
} from './input.js';
export type {
  CertMatchType,
  CertMatchResult,
  InstallerType,
  InstallerInfo,
  SystemAppInfo,
  SigningLineageInfo,
  TrustLevel,
  TrustDomain,
  TrustReason,
  TrustEvidence,
  TrustedDeveloper,
  TrustedAppsCatalog,
  DeveloperCertMatch,
} from './types.js';
