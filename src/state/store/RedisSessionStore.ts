import { CorruptSessionError, sessionRecordSchema } from "./SessionStore";
import type { SessionRecord, SessionStoreAdapter } from "./SessionStore";

/**
 * The subset of commands used here. Both ioredis and the Upstash REST client
 * satisfy it: ioredis hands back strings, Upstash deserializes JSON itself.
 */
export interface SessionRedisClient {
  get(key: string): Promise<unknown>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
}

export class RedisSessionStore implements SessionStoreAdapter {
  constructor(
    private readonly client: SessionRedisClient,
    private readonly prefix = "inventory:sessions:"
  ) {}

  private key(id: string) {
    return `${this.prefix}${id}`;
  }

  /** Accepts either a JSON string (ioredis) or an already parsed object (Upstash). */
  private parseRedisValue(key: string, raw: unknown): SessionRecord | null {
    if (raw === null || raw === undefined) return null;

    let value: unknown = raw;
    if (typeof raw === "string") {
      try {
        value = JSON.parse(raw);
      } catch (error) {
        throw new CorruptSessionError(`Failed to parse Redis session value as JSON: ${String(error)}`, key);
      }
    }

    const parsed = sessionRecordSchema.safeParse(value);
    if (!parsed.success) {
      throw new CorruptSessionError(
        `Invalid session record in Redis: ${parsed.error.issues.map((i) => i.message).join(", ")}`,
        key
      );
    }
    return parsed.data;
  }

  async get(key: string): Promise<SessionRecord | null> {
    return this.parseRedisValue(key, await this.client.get(this.key(key)));
  }

  async set(key: string, record: SessionRecord, ttlSeconds: number): Promise<void> {
    await this.client.setex(this.key(key), ttlSeconds, JSON.stringify(record));
  }

  async delete(key: string): Promise<boolean> {
    return (await this.client.del(this.key(key))) > 0;
  }
}
