import { getPool } from '../db/index.js';
import type { EventQuery, EventStore } from './event-store.js';
import { SecurityEventSchema } from './schema.js';
import type { SecurityEvent } from './types.js';

interface EventRow {
  event_json: unknown;
  is_promoted: boolean;
}

export class PgEventStore implements EventStore {
  async recordEvents(events: readonly SecurityEvent[], expiresAt: number): Promise<number> {
    if (events.length === 0) return 0;
    const pool = getPool();
    const client = await pool.connect();

    try {
      await client.query('BEGIN');
      let inserted = 0;
      for (const e of events) {
        const result = await client.query(
          `INSERT INTO security_events
             (id, package_name, event_type, severity, source, start_time, end_time, summary, event_json, is_promoted, expires_at)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
           ON CONFLICT (id) DO NOTHING`,
          [
            e.id,
            e.packageName,
            e.type,
            e.severity,
            e.source,
            e.startTime,
            e.endTime,
            e.summary,
            JSON.stringify(e),
            e.isPromoted,
            expiresAt,
          ],
        );
        inserted += result.rowCount ?? 0;
      }
      await client.query('COMMIT');
      return inserted;
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async listEvents(query: EventQuery = {}): Promise<SecurityEvent[]> {
    const pool = getPool();
    const conditions: string[] = [];
    const params: unknown[] = [];
    if (query.packageName !== undefined) {
      params.push(query.packageName);
      conditions.push(`package_name = $${params.length}`);
    }
    if (query.since !== undefined) {
      params.push(query.since);
      conditions.push(`start_time >= $${params.length}`);
    }
    if (query.ids !== undefined) {
      params.push([...query.ids]);
      conditions.push(`id = ANY($${params.length})`);
    }
    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await pool.query<EventRow>(
      `SELECT event_json, is_promoted FROM security_events ${where} ORDER BY start_time DESC`,
      params,
    );
    return result.rows.map((r) => ({ ...SecurityEventSchema.parse(r.event_json), isPromoted: r.is_promoted }));
  }

  async markPromoted(ids: readonly string[]): Promise<void> {
    if (ids.length === 0) return;
    const pool = getPool();
    await pool.query('UPDATE security_events SET is_promoted = TRUE WHERE id = ANY($1)', [[...ids]]);
  }

  async deleteExpired(now: number): Promise<number> {
    const pool = getPool();
    const result = await pool.query('DELETE FROM security_events WHERE expires_at <= $1', [now]);
    return result.rowCount ?? 0;
  }
}
