export {
  compareWithBaseline,
  updateBaseline,
  findRemovedApps,
  snapshotFromEvidence,
  surfaceIncreaseSeverity,
  SURFACE_RATIO_MEDIUM,
  SURFACE_DELTA_MEDIUM,
  SURFACE_FROM_ZERO_HIGH,
} from './compare.js';
export { HIGH_RISK_PERMISSIONS, isHighRiskPermission, permissionSetHash, highRiskSubset } from './permissions.js';
export { InMemoryBaselineStore } from './memory-store.js';
export { PgBaselineStore } from './pg-store.js';
export { KeyedMutex } from './keyed-mutex.js';
export type { BaselineStore, StoredConfigBaseline } from './store.js';
export type {
  BaselineRecord,
  BaselineSnapshot,
  BaselineStatus,
  BaselineAnomaly,
  BaselineComparison,
  BaselineContext,
  AnomalyType,
  AnomalySeverity,
} from './types.js';
