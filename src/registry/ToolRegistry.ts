import pTimeout from "p-timeout";
import type { ToolCall } from "../types/Message.js";
import type { ToolHandler, ToolSpec } from "../types/ToolSpec.js";
import type { ToolError, ToolErrorKind, ToolResult } from "../types/ToolResult.js";
import {
  AgentRuntimeError,
  DuplicateToolNameError,
  InvalidToolSpecError,
  ToolTimeoutError,
  UnknownToolError,
  errorMessage,
} from "../core/errors.js";
import { isRecord } from "../core/guards.js";
import { withRetry } from "../core/Retry.js";
import { SchemaValidator } from "../core/SchemaValidator.js";
import { silentLogger, summarizeForLog, type Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";

const TOOL_NAME_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
const TOOL_ERROR_KINDS = new Set<string>([
  "UNKNOWN_TOOL",
  "INVALID_ARGUMENTS",
  "TIMEOUT",
  "TOOL_EXECUTION_FAILED",
]);

export interface ToolRegistryOptions {
  /** Per-invocation timeout in ms (default: 30000) */
  toolTimeoutMs?: number;
  /** Retries after a failed or timed-out invocation (default: 0) */
  toolRetries?: number;
  /** Base backoff delay between retries in ms (default: 500) */
  retryBaseDelayMs?: number;
  validator?: SchemaValidator;
  logger?: Logger;
  metrics?: Metrics;
}

export interface DispatchOptions {
  conversationId?: string;
}

interface RegisteredTool {
  spec: ToolSpec;
  handler: ToolHandler;
}

/**
 * Tool Registry: per-agent name → (spec, handler) table.
 * Advertises tools to the model and dispatches the calls it requests.
 * Filled once while the agent is constructed, read-only afterwards.
 */
export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();
  private readonly validator: SchemaValidator;
  private readonly toolTimeoutMs: number;
  private readonly toolRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly logger: Logger;
  private readonly metrics?: Metrics;

  constructor(options: ToolRegistryOptions = {}) {
    this.validator = options.validator ?? new SchemaValidator();
    this.toolTimeoutMs = options.toolTimeoutMs ?? 30_000;
    this.toolRetries = options.toolRetries ?? 0;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
  }

  /**
   * Register a tool. Throws on a duplicate name or a malformed spec.
   */
  register(spec: ToolSpec, handler: ToolHandler): void {
    if (this.tools.has(spec.name)) {
      throw new DuplicateToolNameError(spec.name);
    }
    const frozen: ToolSpec = Object.freeze({
      name: spec.name,
      description: spec.description,
      parameters: Object.freeze({ ...spec.parameters }),
    });
    this.validateSpec(frozen);
    this.tools.set(spec.name, { spec: frozen, handler });
    this.logger.debug("tool.registered", { tool: spec.name });
  }

  /**
   * All tool specs, in registration order.
   */
  describeAll(): ToolSpec[] {
    return [...this.tools.values()].map((t) => t.spec);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /**
   * Resolve one tool call. Never throws: every failure becomes an error result.
   */
  async dispatch(call: ToolCall, options: DispatchOptions = {}): Promise<ToolResult> {
    const started = Date.now();
    const finish = (outcome: { output: unknown } | { error: ToolError }): ToolResult => {
      const result: ToolResult = {
        toolCallId: call.id,
        toolName: call.name,
        ok: !("error" in outcome),
        ...outcome,
        arguments: call.arguments,
        durationMs: Date.now() - started,
        createdAt: new Date().toISOString(),
      };
      this.metrics?.recordToolDispatch(call.name, result.ok, result.durationMs);
      if (result.ok) {
        this.logger.debug("tool.dispatch.ok", {
          tool: call.name,
          toolCallId: call.id,
          durationMs: result.durationMs,
          ...(this.logger.isEnabled("trace")
            ? { args: call.arguments, output: summarizeForLog(result.output) }
            : {}),
        });
      } else {
        this.logger.warn("tool.dispatch.failed", {
          tool: call.name,
          toolCallId: call.id,
          durationMs: result.durationMs,
          error: result.error,
        });
      }
      return result;
    };

    const entry = this.tools.get(call.name);
    if (!entry) {
      const error = new UnknownToolError(call.name);
      return finish({
        error: {
          kind: "UNKNOWN_TOOL",
          message: `${error.message}. Available tools: ${[...this.tools.keys()].join(", ")}`,
        },
      });
    }

    const validation = this.validator.validate(entry.spec.parameters, call.arguments);
    if (!validation.valid) {
      return finish({
        error: {
          kind: "INVALID_ARGUMENTS",
          message: `Invalid arguments for ${call.name}: ${validation.message}`,
          details: validation.errors,
        },
      });
    }
    const args = isRecord(validation.data) ? validation.data : {};

    try {
      const output = await withRetry(
        () => this.invokeOnce(entry, args, call, options),
        {
          maxRetries: this.toolRetries,
          baseDelayMs: this.retryBaseDelayMs,
          onRetry: (error, attempt) => {
            this.metrics?.recordRetry(`tool:${call.name}`);
            this.logger.info("tool.retry", {
              tool: call.name,
              attempt,
              error: error.message,
            });
          },
        },
      );
      return finish({ output });
    } catch (error) {
      return finish({ error: toToolError(error) });
    }
  }

  private async invokeOnce(
    entry: RegisteredTool,
    args: Record<string, unknown>,
    call: ToolCall,
    options: DispatchOptions,
  ): Promise<unknown> {
    const controller = new AbortController();
    const running = Promise.resolve().then(() =>
      entry.handler(args, {
        toolCallId: call.id,
        conversationId: options.conversationId,
        signal: controller.signal,
      }),
    );
    try {
      return await pTimeout(running, {
        milliseconds: this.toolTimeoutMs,
        message: new ToolTimeoutError(call.name, this.toolTimeoutMs),
      });
    } catch (error) {
      if (error instanceof ToolTimeoutError) {
        controller.abort();
        throw error;
      }
      throw new AgentRuntimeError("TOOL_EXECUTION_FAILED", errorMessage(error));
    }
  }

  private validateSpec(spec: ToolSpec): void {
    if (!TOOL_NAME_PATTERN.test(spec.name)) {
      throw new InvalidToolSpecError(spec.name, "name must match ^[a-zA-Z0-9_-]{1,64}$");
    }
    if (!spec.description) {
      throw new InvalidToolSpecError(spec.name, "description is required");
    }
    if (!isRecord(spec.parameters) || spec.parameters.type !== "object") {
      throw new InvalidToolSpecError(spec.name, "parameters must be an object schema");
    }
    try {
      this.validator.compile(spec.parameters);
    } catch (error) {
      throw new InvalidToolSpecError(spec.name, errorMessage(error));
    }
  }
}

function isToolErrorKind(kind: string): kind is ToolErrorKind {
  return TOOL_ERROR_KINDS.has(kind);
}

function toToolError(error: unknown): ToolError {
  if (error instanceof AgentRuntimeError && isToolErrorKind(error.kind)) {
    return { kind: error.kind, message: error.message };
  }
  return { kind: "TOOL_EXECUTION_FAILED", message: errorMessage(error) };
}
