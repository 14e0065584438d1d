import type { SecurityEvent } from './types.js';

export interface EventQuery {
  packageName?: string;
  /** Only events that started at or after this time. */
  since?: number;
  ids?: readonly string[];
}

/**
 * Recorded security events. IDs are deterministic, so recording the same
 * event twice keeps the first copy.
 */
export interface EventStore {
  recordEvents(events: readonly SecurityEvent[], expiresAt: number): Promise<number>;
  listEvents(query?: EventQuery): Promise<SecurityEvent[]>;
  markPromoted(ids: readonly string[]): Promise<void>;
  deleteExpired(now: number): Promise<number>;
}

interface StoredEvent {
  event: SecurityEvent;
  expiresAt: number;
}

export class InMemoryEventStore implements EventStore {
  private readonly events = new Map<string, StoredEvent>();

  async recordEvents(events: readonly SecurityEvent[], expiresAt: number): Promise<number> {
    let inserted = 0;
    for (const event of events) {
      if (this.events.has(event.id)) continue;
      this.events.set(event.id, { event: structuredClone(event), expiresAt });
      inserted++;
    }
    return inserted;
  }

  async listEvents(query: EventQuery = {}): Promise<SecurityEvent[]> {
    return [...this.events.values()]
      .map((s) => s.event)
      .filter((e) => query.packageName === undefined || e.packageName === query.packageName)
      .filter((e) => query.since === undefined || e.startTime >= query.since)
      .filter((e) => query.ids === undefined || query.ids.includes(e.id))
      .sort((a, b) => b.startTime - a.startTime)
      .map((e) => structuredClone(e));
  }

  async markPromoted(ids: readonly string[]): Promise<void> {
    for (const id of ids) {
      const stored = this.events.get(id);
      if (stored) stored.event = { ...stored.event, isPromoted: true };
    }
  }

  async deleteExpired(now: number): Promise<number> {
    let deleted = 0;
    for (const [id, stored] of this.events) {
      if (stored.expiresAt <= now) {
        this.events.delete(id);
        deleted++;
      }
    }
    return deleted;
  }
}
