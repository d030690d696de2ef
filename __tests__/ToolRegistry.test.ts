import { describe, it, expect, beforeEach } from "vitest";
import { ToolRegistry } from "../src/registry/ToolRegistry.js";
import { DuplicateToolNameError, InvalidToolSpecError } from "../src/core/errors.js";
import { Metrics } from "../src/observability/Metrics.js";
import type { ToolContext, ToolSpec } from "../src/types/ToolSpec.js";
import { delay, echoTool, toolCall } from "./fixtures/index.js";

const addSpec: ToolSpec = {
  name: "add",
  description: "Add two numbers",
  parameters: {
    type: "object",
    properties: {
      a: { type: "number" },
      b: { type: "number" },
      round: { type: "boolean", default: false },
    },
    required: ["a", "b"],
    additionalProperties: false,
  },
};

describe("ToolRegistry", () => {
  let registry: ToolRegistry;

  beforeEach(() => {
    registry = new ToolRegistry({ toolTimeoutMs: 200 });
  });

  describe("register / describeAll", () => {
    it("should list specs in registration order", () => {
      registry.register(addSpec, () => 0);
      const echo = echoTool();
      registry.register(echo.spec, echo.handler);
      expect(registry.describeAll().map((s) => s.name)).toEqual(["add", "echo"]);
      expect(registry.size).toBe(2);
      expect(registry.has("add")).toBe(true);
    });

    it("should reject a duplicate name", () => {
      registry.register(addSpec, () => 0);
      expect(() => registry.register(addSpec, () => 1)).toThrow(DuplicateToolNameError);
      expect(registry.size).toBe(1);
    });

    it("should reject invalid names and schemas", () => {
      expect(() =>
        registry.register({ ...addSpec, name: "has space" }, () => 0),
      ).toThrow(InvalidToolSpecError);
      expect(() =>
        registry.register({ ...addSpec, name: "nodesc", description: "" }, () => 0),
      ).toThrow(/description is required/);
      expect(() =>
        registry.register(
          {
            name: "badschema",
            description: "Broken schema",
            parameters: { type: "object", properties: { a: { type: "not-a-type" } } },
          },
          () => 0,
        ),
      ).toThrow(InvalidToolSpecError);
      expect(registry.size).toBe(0);
    });

    it("should keep registered specs immutable", () => {
      const spec: ToolSpec = { ...addSpec, parameters: { ...addSpec.parameters } };
      registry.register(spec, () => 0);
      spec.description = "changed";
      const [stored] = registry.describeAll();
      expect(stored?.description).toBe("Add two numbers");
      expect(Object.isFrozen(stored)).toBe(true);
    });
  });

  describe("dispatch", () => {
    it("should run the handler with validated arguments", async () => {
      registry.register(addSpec, (args) => ({ sum: Number(args.a) + Number(args.b), round: args.round }));
      const result = await registry.dispatch(toolCall("call_1", "add", { a: 2, b: 3 }));
      expect(result.ok).toBe(true);
      expect(result.output).toEqual({ sum: 5, round: false });
      expect(result.toolCallId).toBe("call_1");
      expect(result.toolName).toBe("add");
      expect(result.arguments).toEqual({ a: 2, b: 3 });
    });

    it("should report an unknown tool with the available names", async () => {
      registry.register(addSpec, () => 0);
      const result = await registry.dispatch(toolCall("call_1", "subtract"));
      expect(result.ok).toBe(false);
      expect(result.error?.kind).toBe("UNKNOWN_TOOL");
      expect(result.error?.message).toBe('Unknown tool "subtract". Available tools: add');
    });

    it("should reject arguments that do not match the schema without calling the handler", async () => {
      let calls = 0;
      registry.register(addSpec, () => {
        calls++;
        return 0;
      });
      const result = await registry.dispatch(toolCall("call_1", "add", { a: 1 }));
      expect(result.ok).toBe(false);
      expect(result.error?.kind).toBe("INVALID_ARGUMENTS");
      expect(result.error?.message).toContain("Invalid arguments for add");
      expect(calls).toBe(0);
    });

    it("should turn a throwing handler into TOOL_EXECUTION_FAILED", async () => {
      registry.register(addSpec, () => {
        throw new Error("database offline");
      });
      const result = await registry.dispatch(toolCall("call_1", "add", { a: 1, b: 2 }));
      expect(result.ok).toBe(false);
      expect(result.error).toEqual({ kind: "TOOL_EXECUTION_FAILED", message: "database offline" });
    });

    it("should time out a slow handler and abort its signal", async () => {
      let seen: ToolContext | undefined;
      registry.register(addSpec, async (_args, ctx) => {
        seen = ctx;
        await delay(1_000);
        return 0;
      });
      const result = await registry.dispatch(toolCall("call_1", "add", { a: 1, b: 2 }), {
        conversationId: "conv-1",
      });
      expect(result.ok).toBe(false);
      expect(result.error?.kind).toBe("TIMEOUT");
      expect(result.error?.message).toBe('Tool "add" timed out after 200ms');
      expect(seen?.signal.aborted).toBe(true);
      expect(seen?.conversationId).toBe("conv-1");
      expect(seen?.toolCallId).toBe("call_1");
    });

    it("should retry failed invocations when retries are configured", async () => {
      const metrics = new Metrics();
      const retrying = new ToolRegistry({ toolRetries: 2, retryBaseDelayMs: 1, metrics });
      let attempts = 0;
      retrying.register(addSpec, () => {
        attempts++;
        if (attempts < 3) throw new Error("flaky");
        return "ok";
      });
      const result = await retrying.dispatch(toolCall("call_1", "add", { a: 1, b: 2 }));
      expect(result.ok).toBe(true);
      expect(result.output).toBe("ok");
      expect(attempts).toBe(3);
      expect(metrics.getCounter("retries_total", { scope: "tool:add" })).toBe(2);
      expect(metrics.getCounter("tool_dispatch_total", { tool: "add", ok: "true" })).toBe(1);
    });

    it("should not retry by default", async () => {
      let attempts = 0;
      registry.register(addSpec, () => {
        attempts++;
        throw new Error("flaky");
      });
      await registry.dispatch(toolCall("call_1", "add", { a: 1, b: 2 }));
      expect(attempts).toBe(1);
    });
  });
});
