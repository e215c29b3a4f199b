import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { silentLogger } from "../src/config/logger";
import { SessionStore, newSession } from "../src/state/session";
import type { Session } from "../src/state/session";
import { InMemorySessionStore } from "../src/state/store/InMemorySessionStore";
import { RedisSessionStore } from "../src/state/store/RedisSessionStore";
import { CorruptSessionError } from "../src/state/store/SessionStore";
import type { SessionRedisClient } from "../src/state/store/RedisSessionStore";

function sample(conversationId: string, pointOfSale = "Tienda Centro"): Session {
  return { ...newSession(conversationId, 1000), pointOfSale, stage: "awaiting_container" };
}

/** Behaves like ioredis (strings) or, with `parsed`, like Upstash (objects). */
class FakeRedis implements SessionRedisClient {
  readonly data = new Map<string, unknown>();
  readonly ttls = new Map<string, number>();

  constructor(private readonly parsed = false) {}

  async get(key: string): Promise<unknown> {
    const value = this.data.get(key);
    if (value === undefined) return null;
    return this.parsed && typeof value === "string" ? JSON.parse(value) : value;
  }

  async setex(key: string, seconds: number, value: string): Promise<string> {
    this.data.set(key, value);
    this.ttls.set(key, seconds);
    return "OK";
  }

  async del(...keys: string[]): Promise<number> {
    return keys.filter((key) => this.data.delete(key)).length;
  }
}

describe("InMemorySessionStore", () => {
  it("returns copies, never the stored object", async () => {
    const store = new InMemorySessionStore();
    await store.set("a", sample("a"), 60);

    const first = await store.get("a");
    assert.ok(first);
    first.pointOfSale = "changed";

    assert.equal((await store.get("a"))?.pointOfSale, "Tienda Centro");
  });

  it("expires records after their ttl", async () => {
    let now = 0;
    const store = new InMemorySessionStore(10, () => now);
    await store.set("a", sample("a"), 10);

    now = 10_000;
    assert.ok(await store.get("a"));
    now = 10_001;
    assert.equal(await store.get("a"), null);
  });

  it("evicts the least recently written record at the limit", async () => {
    const store = new InMemorySessionStore(2);
    await store.set("a", sample("a"), 60);
    await store.set("b", sample("b"), 60);
    await store.set("a", sample("a", "Tienda Norte"), 60);
    await store.set("c", sample("c"), 60);

    assert.equal(await store.get("b"), null);
    assert.ok(await store.get("c"));
    assert.equal((await store.get("a"))?.pointOfSale, "Tienda Norte");
  });
});

describe("RedisSessionStore", () => {
  it("writes JSON with the ttl under the prefix", async () => {
    const client = new FakeRedis();
    const store = new RedisSessionStore(client, "test:");
    await store.set("573001234567", sample("573001234567"), 3600);

    assert.equal(client.ttls.get("test:573001234567"), 3600);
    assert.deepEqual(await store.get("573001234567"), sample("573001234567"));
  });

  it("reads values the client already parsed", async () => {
    const store = new RedisSessionStore(new FakeRedis(true), "test:");
    await store.set("a", sample("a"), 60);
    assert.deepEqual(await store.get("a"), sample("a"));
  });

  it("deletes only its own key", async () => {
    const client = new FakeRedis();
    const store = new RedisSessionStore(client, "test:");
    await store.set("a", sample("a"), 60);
    client.data.set("other:a", JSON.stringify(sample("a")));

    assert.equal(await store.delete("a"), true);
    assert.equal(await store.delete("a"), false);
    assert.deepEqual([...client.data.keys()], ["other:a"]);
  });

  it("rejects corrupt records", async () => {
    const client = new FakeRedis();
    const store = new RedisSessionStore(client, "test:");

    client.data.set("test:bad-json", "{not json");
    await assert.rejects(store.get("bad-json"), (error: unknown) => {
      assert.ok(error instanceof CorruptSessionError);
      assert.equal(error.key, "bad-json");
      assert.match(error.message, /Failed to parse Redis session value as JSON/);
      return true;
    });

    client.data.set("test:bad-shape", JSON.stringify({ conversationId: "x", stage: "somewhere" }));
    await assert.rejects(store.get("bad-shape"), CorruptSessionError);
  });
});

describe("SessionStore", () => {
  it("keys sessions by the normalized phone number", async () => {
    const sessions = new SessionStore(new InMemorySessionStore(), 60, silentLogger());
    const before = Date.now();
    const saved = await sessions.save(sample("+57 300 123 4567"));

    assert.equal(saved.conversationId, "573001234567");
    assert.ok(saved.updatedAt >= before);
    assert.deepEqual(await sessions.get("+573001234567"), saved);

    assert.equal(await sessions.delete("573001234567"), true);
    assert.equal(await sessions.get("573001234567"), undefined);
  });

  it("drops a record that no longer validates", async () => {
    const client = new FakeRedis();
    client.data.set("test:573001234567", JSON.stringify({ stage: "old_stage" }));
    const sessions = new SessionStore(new RedisSessionStore(client, "test:"), 60, silentLogger());

    assert.equal(await sessions.get("573001234567"), undefined);
    assert.equal(client.data.has("test:573001234567"), false);
  });

  it("lets other store failures through", async () => {
    class OfflineStore extends InMemorySessionStore {
      override async get(): Promise<null> {
        throw new Error("store offline");
      }
    }
    const sessions = new SessionStore(new OfflineStore(), 60, silentLogger());
    await assert.rejects(sessions.get("573001234567"), /store offline/);
  });
});
