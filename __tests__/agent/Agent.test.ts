import { describe, it, expect } from "vitest";
import { BaseAgent, collectReply } from "../../src/agent/Agent.js";
import { CustomerServiceAgent } from "../../src/agents/customer-service/CustomerServiceAgent.js";
import { TicketStore } from "../../src/agents/customer-service/TicketStore.js";
import { DuplicateToolNameError, TurnFailedError } from "../../src/core/errors.js";
import { InMemoryHistoryStore } from "../../src/history/InMemoryHistoryStore.js";
import type { OutputEvent, TurnSummary } from "../../src/types/Events.js";
import {
  ScriptedCompletionClient,
  callTools,
  echoTool,
  reply,
  testConfig,
  toolCall,
} from "../fixtures/index.js";

async function* events(...items: OutputEvent[]): AsyncGenerator<OutputEvent> {
  yield* items;
}

describe("BaseAgent", () => {
  it("should fail construction on a duplicate tool name", () => {
    const client = new ScriptedCompletionClient([]);
    expect(
      () =>
        new BaseAgent(
          { config: testConfig(), history: new InMemoryHistoryStore(), client },
          { kind: "test", name: "Test", persona: "p", tools: [echoTool(), echoTool()] },
        ),
    ).toThrow(DuplicateToolNameError);
  });

  it("should report each finished turn until unsubscribed", async () => {
    const client = new ScriptedCompletionClient([reply("one"), reply("two")]);
    const agent = new BaseAgent(
      { config: testConfig(), history: new InMemoryHistoryStore(), client },
      { kind: "test", name: "Test", persona: "p", tools: [echoTool()] },
    );
    const summaries: TurnSummary[] = [];
    const unsubscribe = agent.onTurnFinished((s) => summaries.push(s));

    const first = agent.processMessage("first", "conv");
    await collectReply(first);
    await first.finished;
    unsubscribe();
    await collectReply(agent.processMessage("second", "conv"));

    expect(summaries).toHaveLength(1);
    expect(summaries[0]).toMatchObject({ conversationId: "conv", outcome: "completed", modelCalls: 1 });
  });

  it("should apply the configured tool budget", async () => {
    const client = new ScriptedCompletionClient([], callTools(toolCall("c", "echo")));
    const agent = new BaseAgent(
      {
        config: testConfig({ engine: { maxToolIterations: 2 } }),
        history: new InMemoryHistoryStore(),
        client,
      },
      { kind: "test", name: "Test", persona: "p", tools: [echoTool()] },
    );
    await collectReply(agent.processMessage("loop", "conv"));
    expect(client.callCount).toBe(2);
  });
});

describe("CustomerServiceAgent", () => {
  it("should create a ticket through the model's tool call", async () => {
    const history = new InMemoryHistoryStore();
    const tickets = new TicketStore(() => new Date("2024-03-05T10:00:00Z"));
    const client = new ScriptedCompletionClient([
      callTools(
        toolCall("call_1", "create_ticket", {
          customer_name: "Sam Doe",
          customer_email: "sam@example.com",
          issue_type: "billing",
          priority: "high",
          subject: "Billing issue",
          description: "I was charged twice this month",
        }),
      ),
      reply("Your ticket has been created."),
    ]);
    const agent = new CustomerServiceAgent(
      { config: testConfig(), history, client },
      { tickets },
    );

    const text = await collectReply(agent.processMessage("Create a ticket for billing issue", "conv"));

    expect(text).toBe("Your ticket has been created.");
    const stored = await history.getMessages("conv");
    expect(stored.map((m) => m.role)).toEqual(["user", "assistant", "tool", "assistant"]);
    expect(stored[1]?.toolCalls.map((c) => c.name)).toEqual(["create_ticket"]);
    expect(stored[2]?.toolCallId).toBe("call_1");

    expect(tickets.size).toBe(1);
    const result: unknown = JSON.parse(stored[2]?.content ?? "null");
    expect(result).toMatchObject({
      success: true,
      ticket_details: { status: "open", priority: "high", estimated_response_time: "2-4 hours" },
    });
    expect(stored[2]?.content).toMatch(/"ticket_id":"TKT-20240305-[0-9A-F]{8}"/);
  });

  it("should advertise its three tools", () => {
    const agent = new CustomerServiceAgent({
      config: testConfig(),
      history: new InMemoryHistoryStore(),
      client: new ScriptedCompletionClient([]),
    });
    expect(agent.kind).toBe("customer_service");
    expect(agent.describeTools().map((t) => t.name)).toEqual([
      "create_ticket",
      "update_ticket",
      "search_faq",
    ]);
  });
});

describe("collectReply", () => {
  it("should join content up to done", async () => {
    const text = await collectReply(
      events({ type: "content", text: "a" }, { type: "content", text: "b" }, { type: "done" }),
    );
    expect(text).toBe("ab");
  });

  it("should throw TurnFailedError on an error event", async () => {
    const failing = collectReply(
      events(
        { type: "content", text: "partial" },
        { type: "error", kind: "MODEL_CALL_FAILED", message: "Model call failed: boom" },
      ),
    );
    await expect(failing).rejects.toBeInstanceOf(TurnFailedError);
    await expect(
      collectReply(events({ type: "error", kind: "INTERNAL", message: "Internal error: x" })),
    ).rejects.toMatchObject({ kind: "INTERNAL", message: "Internal error: x" });
  });
});
