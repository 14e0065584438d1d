import type { ConfigSnapshot } from '../evidence/input.js';
import type { AppFeatureVector } from '../incidents/types.js';
import type { BaselineRecord } from './types.js';

export interface StoredConfigBaseline {
  configHash: string;
  snapshot: ConfigSnapshot;
  updatedAt: number;
}

/**
 * Persistence for per-package baselines and the device config baseline.
 * Callers serialize read-compare-write per package; implementations only
 * have to make a single upsert atomic.
 */
export interface BaselineStore {
  getBaseline(packageName: string): Promise<BaselineRecord | null>;
  listBaselines(): Promise<BaselineRecord[]>;
  countBaselines(): Promise<number>;
  upsertBaseline(record: BaselineRecord): Promise<void>;
  getConfigBaseline(): Promise<StoredConfigBaseline | null>;
  saveConfigBaseline(baseline: StoredConfigBaseline): Promise<void>;
  /** Kept on the package's baseline; ignored when the package has none. */
  saveFeatureVector(vector: AppFeatureVector): Promise<void>;
  listFeatureVectors(packageNames?: readonly string[]): Promise<AppFeatureVector[]>;
  clearFeatureVectors(packageNames: readonly string[]): Promise<void>;
}
