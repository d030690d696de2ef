import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryHistoryStore } from "../../src/history/InMemoryHistoryStore.js";
import { RedisHistoryStore } from "../../src/history/RedisHistoryStore.js";
import { createHistoryStore } from "../../src/history/createHistoryStore.js";
import { StorageUnavailableError } from "../../src/core/errors.js";
import { Metrics } from "../../src/observability/Metrics.js";
import { assistantMessage, toolMessage, userMessage } from "../../src/types/Message.js";
import type { ToolResult } from "../../src/types/ToolResult.js";
import { FakeRedisListClient, testConfig, toolCall } from "../fixtures/index.js";

function result(toolCallId: string, output: unknown = { ok: true }): ToolResult {
  return {
    toolCallId,
    toolName: "echo",
    ok: true,
    output,
    arguments: {},
    durationMs: 1,
    createdAt: new Date(0).toISOString(),
  };
}

describe("InMemoryHistoryStore", () => {
  let store: InMemoryHistoryStore;

  beforeEach(() => {
    store = new InMemoryHistoryStore();
  });

  it("should keep messages in append order per conversation", async () => {
    await store.appendMessage("a", userMessage("hello"));
    await store.appendMessage("b", userMessage("other"));
    await store.appendMessage("a", assistantMessage("hi"));
    const messages = await store.getMessages("a");
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ["user", "hello"],
      ["assistant", "hi"],
    ]);
    expect(store.conversationCount).toBe(2);
  });

  it("should return copies that cannot change the log", async () => {
    await store.appendMessage("a", userMessage("hello"));
    const [first] = await store.getMessages("a");
    if (first) first.content = "tampered";
    const [again] = await store.getMessages("a");
    expect(again?.content).toBe("hello");
  });

  it("should not share tool calls with the log", async () => {
    await store.appendMessage("a", userMessage("hello"));
    await store.appendMessage("a", assistantMessage(null, [toolCall("c1", "echo", { text: "x" })]));
    const messages = await store.getMessages("a");
    const call = messages[1]?.toolCalls[0];
    if (call) call.arguments.text = "tampered";
    messages[1]?.toolCalls.push(toolCall("c2", "echo"));

    const [, again] = await store.getMessages("a");
    expect(again?.toolCalls).toEqual([{ id: "c1", name: "echo", arguments: { text: "x" } }]);
  });

  it("should build a repaired context window", async () => {
    await store.appendMessage("a", userMessage("u1"));
    await store.appendMessage("a", assistantMessage(null, [toolCall("c1", "echo")]));
    await store.appendMessage("a", userMessage("u2"));
    const context = await store.getContext("a", 5);
    expect(context.map((m) => m.content)).toEqual(["u1", "u2"]);
  });

  it("should return an empty context for an unknown conversation", async () => {
    expect(await store.getContext("missing", 5)).toEqual([]);
  });

  it("should cap tool results when configured", async () => {
    const capped = new InMemoryHistoryStore({ maxToolResults: 2 });
    await capped.appendToolResult("a", result("c1"));
    await capped.appendToolResult("a", result("c2"));
    await capped.appendToolResult("a", result("c3"));
    const results = await capped.getToolResults("a");
    expect(results.map((r) => r.toolCallId)).toEqual(["c2", "c3"]);
    expect((await capped.getToolResults("a", 1)).map((r) => r.toolCallId)).toEqual(["c3"]);
  });

  it("should report healthy", async () => {
    expect(await store.healthCheck()).toEqual({ status: "healthy", backend: "memory", latencyMs: 0 });
  });
});

describe("RedisHistoryStore", () => {
  let client: FakeRedisListClient;
  let store: RedisHistoryStore;

  beforeEach(() => {
    client = new FakeRedisListClient();
    store = new RedisHistoryStore({
      client,
      keyPrefix: "test",
      ttlSeconds: 60,
      retries: 2,
      retryBaseDelayMs: 1,
    });
  });

  it("should push JSON records and refresh the expiry", async () => {
    const stored = await store.appendMessage("conv", userMessage("hello"));
    const raw = client.lists.get("test:history:conv") ?? [];
    expect(raw).toHaveLength(1);
    expect(JSON.parse(raw[0] ?? "null")).toEqual(stored);
    expect(client.ttls.get("test:history:conv")).toBe(60);
    expect(client.commands).toEqual(["rpush", "expire"]);
  });

  it("should read back messages with tool calls", async () => {
    await store.appendMessage("conv", userMessage("u1"));
    await store.appendMessage("conv", assistantMessage(null, [toolCall("c1", "echo", { text: "x" })]));
    await store.appendMessage("conv", toolMessage("c1", "echo", '{"echoed":"x"}'));
    await store.appendMessage("conv", assistantMessage("done"));

    const context = await store.getContext("conv", 5);
    expect(context.map((m) => m.role)).toEqual(["user", "assistant", "tool", "assistant"]);
    expect(context[1]?.toolCalls).toEqual([{ id: "c1", name: "echo", arguments: { text: "x" } }]);
    expect(context[2]?.toolCallId).toBe("c1");
  });

  it("should skip records that are not valid JSON or not messages", async () => {
    await store.appendMessage("conv", userMessage("u1"));
    client.lists.get("test:history:conv")?.push("{not json", JSON.stringify({ role: "nobody" }));
    await store.appendMessage("conv", assistantMessage("a1"));
    const messages = await store.getMessages("conv");
    expect(messages.map((m) => m.content)).toEqual(["u1", "a1"]);
  });

  it("should trim the tool-result log when capped", async () => {
    const capped = new RedisHistoryStore({ client, keyPrefix: "test", maxToolResults: 2 });
    await capped.appendToolResult("conv", result("c1"));
    await capped.appendToolResult("conv", result("c2"));
    await capped.appendToolResult("conv", result("c3"));
    const results = await capped.getToolResults("conv");
    expect(results.map((r) => r.toolCallId)).toEqual(["c2", "c3"]);
    expect((await capped.getToolResults("conv", 1)).map((r) => r.toolCallId)).toEqual(["c3"]);
  });

  it("should retry transient failures", async () => {
    const metrics = new Metrics();
    const retrying = new RedisHistoryStore({ client, retries: 2, retryBaseDelayMs: 1, metrics });
    client.failures = 1;
    await retrying.appendMessage("conv", userMessage("hello"));
    expect(await retrying.getMessages("conv")).toHaveLength(1);
    expect(metrics.getCounter("retries_total", { scope: "storage" })).toBe(1);
  });

  it("should not push a message twice when only the expiry fails", async () => {
    client.failing.set("expire", 1);
    await store.appendMessage("conv", userMessage("hello"));
    expect(await store.getMessages("conv")).toHaveLength(1);
    expect(client.commands).toEqual(["rpush", "expire", "expire", "lrange"]);
    expect(client.ttls.get("test:history:conv")).toBe(60);
  });

  it("should not push a tool result twice when the trim fails", async () => {
    const capped = new RedisHistoryStore({
      client,
      keyPrefix: "test",
      maxToolResults: 5,
      retries: 2,
      retryBaseDelayMs: 1,
    });
    client.failing.set("ltrim", 1);
    await capped.appendToolResult("conv", result("c1"));
    expect((await capped.getToolResults("conv")).map((r) => r.toolCallId)).toEqual(["c1"]);
  });

  it("should raise StorageUnavailableError when Redis stays down", async () => {
    client.down = true;
    const failure = store.appendMessage("conv", userMessage("hello"));
    await expect(failure).rejects.toBeInstanceOf(StorageUnavailableError);
    await expect(store.getContext("conv", 5)).rejects.toMatchObject({
      kind: "STORAGE_UNAVAILABLE",
      operation: "getMessages",
    });
    // one attempt plus two retries
    expect(client.commands.filter((c) => c === "lrange")).toHaveLength(3);
  });

  it("should report health from PING", async () => {
    expect((await store.healthCheck()).status).toBe("healthy");
    client.down = true;
    expect(await store.healthCheck()).toEqual({
      status: "unhealthy",
      backend: "redis",
      error: "connect ECONNREFUSED 127.0.0.1:6379",
    });
  });

  it("should quit the client on close", async () => {
    await store.close();
    expect(client.quitCalled).toBe(true);
  });
});

describe("createHistoryStore", () => {
  it("should build the memory backend by default", () => {
    expect(createHistoryStore(testConfig().storage).backend).toBe("memory");
  });

  it("should build the redis backend on the given client", async () => {
    const client = new FakeRedisListClient();
    const config = testConfig({ storage: { type: "redis", redisUrl: "redis://localhost:6379" } });
    const store = createHistoryStore(config.storage, { redisClient: client });
    expect(store.backend).toBe("redis");
    await store.appendMessage("conv", userMessage("hi"));
    expect(client.lists.has("agent:history:conv")).toBe(true);
  });
});
