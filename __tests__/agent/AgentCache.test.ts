import { describe, it, expect, beforeEach } from "vitest";
import { AgentCache, agentCacheKey, type EvictionReason } from "../../src/agent/AgentCache.js";
import type { Agent } from "../../src/agent/Agent.js";
import type { TurnStream } from "../../src/engine/TurnEngine.js";

class StubAgent implements Agent {
  readonly kind = "stub";
  closed = false;

  constructor(readonly name: string) {}

  describeTools() {
    return [];
  }

  processMessage(): TurnStream {
    throw new Error("not used");
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

describe("agentCacheKey", () => {
  it("should combine kind and id", () => {
    expect(agentCacheKey("customer_service", "user-1")).toBe('["customer_service","user-1"]');
    expect(agentCacheKey("customer_service")).toBe('["customer_service"]');
  });

  it("should keep kinds and ids containing a colon apart", () => {
    expect(agentCacheKey("a", "b:c")).not.toBe(agentCacheKey("a:b", "c"));
  });
});

describe("AgentCache", () => {
  let clock: number;
  let cache: AgentCache;
  let evictions: Array<{ key: string; reason: EvictionReason }>;

  beforeEach(() => {
    clock = 0;
    cache = new AgentCache({ maxAgents: 2, ttlMs: 1_000, now: () => clock });
    evictions = [];
    cache.on("evicted", (e) => evictions.push(e));
  });

  it("should create once and reuse on later lookups", () => {
    let created = 0;
    const make = () => {
      created++;
      return new StubAgent("a");
    };
    const first = cache.getOrCreate("a", make);
    const second = cache.getOrCreate("a", make);
    expect(second).toBe(first);
    expect(created).toBe(1);
  });

  it("should evict the least recently used agent at capacity and close it", () => {
    const a = new StubAgent("a");
    cache.getOrCreate("a", () => a);
    cache.getOrCreate("b", () => new StubAgent("b"));
    cache.getOrCreate("a", () => new StubAgent("a2"));
    cache.getOrCreate("c", () => new StubAgent("c"));

    expect(cache.keys()).toEqual(["a", "c"]);
    expect(evictions).toEqual([{ key: "b", reason: "capacity" }]);
    expect(a.closed).toBe(false);
  });

  it("should expire agents idle past the TTL", () => {
    const a = new StubAgent("a");
    cache.getOrCreate("a", () => a);
    clock = 500;
    cache.getOrCreate("b", () => new StubAgent("b"));
    clock = 1_200;
    cache.prune();

    expect(cache.keys()).toEqual(["b"]);
    expect(evictions).toEqual([{ key: "a", reason: "expired" }]);
    expect(a.closed).toBe(true);
  });

  it("should refresh the idle timer on use", () => {
    cache.getOrCreate("a", () => new StubAgent("a"));
    clock = 900;
    cache.getOrCreate("a", () => new StubAgent("other"));
    clock = 1_500;
    expect(cache.getOrCreate("a", () => new StubAgent("other")).name).toBe("a");
  });

  it("should close agents on delete and clear", async () => {
    const a = new StubAgent("a");
    const b = new StubAgent("b");
    cache.getOrCreate("a", () => a);
    cache.getOrCreate("b", () => b);

    expect(await cache.delete("a")).toBe(true);
    expect(await cache.delete("a")).toBe(false);
    expect(a.closed).toBe(true);

    await cache.clear();
    expect(b.closed).toBe(true);
    expect(cache.size).toBe(0);
    expect(evictions.map((e) => e.reason)).toEqual(["removed", "removed"]);
  });
});
