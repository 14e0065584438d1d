import { getPool } from '../db/index.js';
import { ConfigSnapshotSchema } from '../evidence/input.js';
import { AppFeatureVectorSchema } from '../incidents/schema.js';
import type { AppFeatureVector } from '../incidents/types.js';
import type { BaselineStore, StoredConfigBaseline } from './store.js';
import type { BaselineRecord } from './types.js';

interface AppBaselineRow {
  package_name: string;
  cert_sha256: string;
  previous_cert_sha256: string | null;
  version_code: string | number;
  version_name: string | null;
  is_system_app: boolean;
  installer_package: string | null;
  apk_path: string | null;
  first_seen_at: string | number;
  last_seen_at: string | number;
  last_cert_change_at: string | number | null;
  scan_count: number;
  permission_set_hash: string;
  high_risk_permissions: string[] | null;
  exported_activity_count: number;
  exported_service_count: number;
  exported_receiver_count: number;
  exported_provider_count: number;
  unprotected_exported_count: number;
}

interface ConfigBaselineRow {
  config_hash: string;
  snapshot_json: unknown;
  updated_at: string | number;
}

const BASELINE_COLUMNS = `package_name, cert_sha256, previous_cert_sha256, version_code, version_name,
  is_system_app, installer_package, apk_path, first_seen_at, last_seen_at, last_cert_change_at,
  scan_count, permission_set_hash, high_risk_permissions, exported_activity_count,
  exported_service_count, exported_receiver_count, exported_provider_count, unprotected_exported_count`;

// BIGINT columns come back from pg as strings.
function rowToRecord(r: AppBaselineRow): BaselineRecord {
  return {
    packageName: r.package_name,
    certSha256: r.cert_sha256,
    previousCertSha256: r.previous_cert_sha256,
    versionCode: Number(r.version_code),
    versionName: r.version_name,
    isSystemApp: r.is_system_app,
    installerPackage: r.installer_package,
    apkPath: r.apk_path,
    firstSeenAt: Number(r.first_seen_at),
    lastSeenAt: Number(r.last_seen_at),
    lastCertChangeAt: r.last_cert_change_at === null ? null : Number(r.last_cert_change_at),
    scanCount: r.scan_count,
    permissionSetHash: r.permission_set_hash,
    highRiskPermissions: r.high_risk_permissions ?? [],
    exportedActivityCount: r.exported_activity_count,
    exportedServiceCount: r.exported_service_count,
    exportedReceiverCount: r.exported_receiver_count,
    exportedProviderCount: r.exported_provider_count,
    unprotectedExportedCount: r.unprotected_exported_count,
  };
}

export class PgBaselineStore implements BaselineStore {
  async getBaseline(packageName: string): Promise<BaselineRecord | null> {
    const pool = getPool();
    const result = await pool.query<AppBaselineRow>(
      `SELECT ${BASELINE_COLUMNS} FROM app_baselines WHERE package_name = $1`,
      [packageName],
    );
    const row = result.rows[0];
    return row ? rowToRecord(row) : null;
  }

  async listBaselines(): Promise<BaselineRecord[]> {
    const pool = getPool();
    const result = await pool.query<AppBaselineRow>(
      `SELECT ${BASELINE_COLUMNS} FROM app_baselines ORDER BY package_name ASC`,
    );
    return result.rows.map(rowToRecord);
  }

  async countBaselines(): Promise<number> {
    const pool = getPool();
    const result = await pool.query<{ count: string }>('SELECT COUNT(*) AS count FROM app_baselines');
    return Number(result.rows[0]?.count ?? 0);
  }

  async upsertBaseline(record: BaselineRecord): Promise<void> {
    const pool = getPool();
    const client = await pool.connect();

    try {
      await client.query('BEGIN');
      // Serializes writers for the same package across instances.
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [record.packageName]);
      await client.query(
        `INSERT INTO app_baselines (${BASELINE_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
         ON CONFLICT (package_name) DO UPDATE SET
           cert_sha256 = EXCLUDED.cert_sha256,
           previous_cert_sha256 = EXCLUDED.previous_cert_sha256,
           version_code = EXCLUDED.version_code,
           version_name = EXCLUDED.version_name,
           is_system_app = EXCLUDED.is_system_app,
           installer_package = EXCLUDED.installer_package,
           apk_path = EXCLUDED.apk_path,
           last_seen_at = EXCLUDED.last_seen_at,
           last_cert_change_at = EXCLUDED.last_cert_change_at,
           scan_count = EXCLUDED.scan_count,
           permission_set_hash = EXCLUDED.permission_set_hash,
           high_risk_permissions = EXCLUDED.high_risk_permissions,
           exported_activity_count = EXCLUDED.exported_activity_count,
           exported_service_count = EXCLUDED.exported_service_count,
           exported_receiver_count = EXCLUDED.exported_receiver_count,
           exported_provider_count = EXCLUDED.exported_provider_count,
           unprotected_exported_count = EXCLUDED.unprotected_exported_count`,
        [
          record.packageName,
          record.certSha256,
          record.previousCertSha256,
          record.versionCode,
          record.versionName,
          record.isSystemApp,
          record.installerPackage,
          record.apkPath,
          record.firstSeenAt,
          record.lastSeenAt,
          record.lastCertChangeAt,
          record.scanCount,
          record.permissionSetHash,
          record.highRiskPermissions,
          record.exportedActivityCount,
          record.exportedServiceCount,
          record.exportedReceiverCount,
          record.exportedProviderCount,
          record.unprotectedExportedCount,
        ],
      );
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async getConfigBaseline(): Promise<StoredConfigBaseline | null> {
    const pool = getPool();
    const result = await pool.query<ConfigBaselineRow>(
      'SELECT config_hash, snapshot_json, updated_at FROM config_baselines WHERE id = 1',
    );
    const row = result.rows[0];
    if (!row) return null;
    return {
      configHash: row.config_hash,
      snapshot: ConfigSnapshotSchema.parse(row.snapshot_json),
      updatedAt: Number(row.updated_at),
    };
  }

  async saveConfigBaseline(baseline: StoredConfigBaseline): Promise<void> {
    const pool = getPool();
    await pool.query(
      `INSERT INTO config_baselines (id, config_hash, snapshot_json, updated_at)
       VALUES (1, $1, $2, $3)
       ON CONFLICT (id) DO UPDATE SET
         config_hash = EXCLUDED.config_hash,
         snapshot_json = EXCLUDED.snapshot_json,
         updated_at = EXCLUDED.updated_at`,
      [baseline.configHash, JSON.stringify(baseline.snapshot), baseline.updatedAt],
    );
  }

  async saveFeatureVector(vector: AppFeatureVector): Promise<void> {
    const pool = getPool();
    await pool.query('UPDATE app_baselines SET feature_vector = $2 WHERE package_name = $1', [
      vector.packageName,
      JSON.stringify(vector),
    ]);
  }

  async listFeatureVectors(packageNames?: readonly string[]): Promise<AppFeatureVector[]> {
    const pool = getPool();
    const result =
      packageNames === undefined
        ? await pool.query<{ feature_vector: unknown }>(
            'SELECT feature_vector FROM app_baselines WHERE feature_vector IS NOT NULL ORDER BY package_name ASC',
          )
        : await pool.query<{ feature_vector: unknown }>(
            `SELECT feature_vector FROM app_baselines
             WHERE feature_vector IS NOT NULL AND package_name = ANY($1)
             ORDER BY package_name ASC`,
            [[...packageNames]],
          );
    return result.rows.map((r) => AppFeatureVectorSchema.parse(r.feature_vector));
  }

  async clearFeatureVectors(packageNames: readonly string[]): Promise<void> {
    if (packageNames.length === 0) return;
    const pool = getPool();
    await pool.query('UPDATE app_baselines SET feature_vector = NULL WHERE package_name = ANY($1)', [[...packageNames]]);
  }
}
