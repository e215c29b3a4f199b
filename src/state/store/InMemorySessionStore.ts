import type { SessionRecord, SessionStoreAdapter } from "./SessionStore";

const DEFAULT_LIMIT = 50_000;

interface Entry {
  record: SessionRecord;
  expiresAt: number;
}

/**
 * Process-local sessions. Records are cloned on the way in and out so callers
 * never share a mutable object with the store.
 */
export class InMemorySessionStore implements SessionStoreAdapter {
  private readonly map = new Map<string, Entry>();

  constructor(
    private readonly limit = DEFAULT_LIMIT,
    private readonly now: () => number = Date.now
  ) {}

  private live(key: string, entry: Entry | undefined): Entry | undefined {
    if (!entry) return undefined;
    if (this.now() > entry.expiresAt) {
      this.map.delete(key);
      return undefined;
    }
    return entry;
  }

  async get(key: string): Promise<SessionRecord | null> {
    const entry = this.live(key, this.map.get(key));
    return entry ? structuredClone(entry.record) : null;
  }

  async set(key: string, record: SessionRecord, ttlSeconds: number): Promise<void> {
    if (this.map.size >= this.limit && !this.map.has(key)) {
      const oldestKey = this.map.keys().next().value;
      if (oldestKey !== undefined) this.map.delete(oldestKey);
    }
    // Re-insert so iteration order tracks recency for eviction
    this.map.delete(key);
    this.map.set(key, { record: structuredClone(record), expiresAt: this.now() + ttlSeconds * 1000 });
  }

  async delete(key: string): Promise<boolean> {
    return this.map.delete(key);
  }
}
