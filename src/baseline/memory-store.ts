import type { AppFeatureVector } from '../incidents/types.js';
import type { BaselineStore, StoredConfigBaseline } from './store.js';
import type { BaselineRecord } from './types.js';

/** Process-local store, used when no DATABASE_URL is configured and in tests. */
export class InMemoryBaselineStore implements BaselineStore {
  private readonly records = new Map<string, BaselineRecord>();
  private readonly vectors = new Map<string, AppFeatureVector>();
  private config: StoredConfigBaseline | null = null;

  async getBaseline(packageName: string): Promise<BaselineRecord | null> {
    const record = this.records.get(packageName);
    return record ? { ...record, highRiskPermissions: [...record.highRiskPermissions] } : null;
  }

  async listBaselines(): Promise<BaselineRecord[]> {
    return [...this.records.values()]
      .map((r) => ({ ...r, highRiskPermissions: [...r.highRiskPermissions] }))
      .sort((a, b) => a.packageName.localeCompare(b.packageName));
  }

  async countBaselines(): Promise<number> {
    return this.records.size;
  }

  async upsertBaseline(record: BaselineRecord): Promise<void> {
    this.records.set(record.packageName, { ...record, highRiskPermissions: [...record.highRiskPermissions] });
  }

  async getConfigBaseline(): Promise<StoredConfigBaseline | null> {
    return this.config;
  }

  async saveConfigBaseline(baseline: StoredConfigBaseline): Promise<void> {
    this.config = baseline;
  }

  async saveFeatureVector(vector: AppFeatureVector): Promise<void> {
    if (!this.records.has(vector.packageName)) return;
    this.vectors.set(vector.packageName, structuredClone(vector));
  }

  async listFeatureVectors(packageNames?: readonly string[]): Promise<AppFeatureVector[]> {
    const wanted = packageNames === undefined ? null : new Set(packageNames);
    return [...this.vectors.values()]
      .filter((v) => wanted === null || wanted.has(v.packageName))
      .sort((a, b) => a.packageName.localeCompare(b.packageName))
      .map((v) => structuredClone(v));
  }

  async clearFeatureVectors(packageNames: readonly string[]): Promise<void> {
    for (const name of packageNames) this.vectors.delete(name);
  }
}
