import { EventEmitter } from "eventemitter3";
import pTimeout from "p-timeout";
import { v4 as uuidv4 } from "uuid";
import {
  assistantMessage,
  systemMessage,
  toolMessage,
  userMessage,
  type Message,
  type ToolCall,
} from "../types/Message.js";
import { renderToolResult } from "../types/ToolResult.js";
import type { ToolSpec } from "../types/ToolSpec.js";
import type {
  OutputEvent,
  TurnFailureKind,
  TurnOutcome,
  TurnState,
  TurnSummary,
  TurnTransition,
} from "../types/Events.js";
import { AgentRuntimeError, ModelCallFailedError, errorMessage } from "../core/errors.js";
import type { HistoryStore } from "../history/HistoryStore.js";
import type { CompletionClient } from "../llm/CompletionClient.js";
import type { ToolRegistry } from "../registry/ToolRegistry.js";
import { silentLogger, summarizeForLog, type Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";
import { OutputChannel } from "./OutputChannel.js";

export const TOOL_BUDGET_FALLBACK =
  "Maximum tool iterations reached. Please try rephrasing or narrowing your request.";

export interface TurnEngineOptions {
  history: HistoryStore;
  registry: ToolRegistry;
  client: CompletionClient;
  persona: string;
  /** TurnBudget: tool-resolution cycles allowed per turn (default: 4) */
  maxToolIterations?: number;
  /** Prior exchanges included in the model context (default: 5) */
  maxContextTurns?: number;
  /** Bound on the wait for each model event, in ms (default: 60000) */
  modelTimeoutMs?: number;
  /** Output events buffered ahead of a slow consumer (default: 16) */
  channelCapacity?: number;
  /** Request streamed completions (default: true) */
  stream?: boolean;
  logger?: Logger;
  metrics?: Metrics;
}

export interface RunTurnOptions {
  /** Fired when the consumer goes away; see cancellation rules on runTurn */
  signal?: AbortSignal;
  persona?: string;
  maxToolIterations?: number;
  maxContextTurns?: number;
}

/**
 * Output of one turn. `finished` settles once the turn has stopped touching
 * history, which can be after the consumer stopped reading.
 */
export interface TurnStream extends AsyncIterable<OutputEvent> {
  readonly finished: Promise<void>;
}

export interface TurnEngineEvents {
  transition: (transition: TurnTransition) => void;
  turnFinished: (summary: TurnSummary) => void;
}

type ModelResponse =
  | { kind: "final"; content: string }
  | { kind: "tools"; content: string; calls: ToolCall[] };

interface TurnRun {
  turnId: string;
  conversationId: string;
  userText: string;
  persona: string;
  maxToolIterations: number;
  maxContextTurns: number;
  channel: OutputChannel<OutputEvent>;
  state: TurnState | null;
  modelCalls: number;
  toolIterations: number;
  /** Bound to the turn and conversation ids */
  log: Logger;
}

/**
 * Turn engine: drives one user turn through
 * BUILD_CONTEXT → AWAIT_MODEL → (DISPATCH_TOOLS → AWAIT_MODEL)* → EMIT_FINAL → DONE,
 * or FAILED, writing every message to the history store in the order it
 * happened and streaming output through a bounded channel.
 */
export class TurnEngine extends EventEmitter<TurnEngineEvents> {
  private readonly history: HistoryStore;
  private readonly registry: ToolRegistry;
  private readonly client: CompletionClient;
  private readonly persona: string;
  private readonly maxToolIterations: number;
  private readonly maxContextTurns: number;
  private readonly modelTimeoutMs: number;
  private readonly channelCapacity: number;
  private readonly stream: boolean;
  private readonly logger: Logger;
  private readonly metrics?: Metrics;

  constructor(options: TurnEngineOptions) {
    super();
    this.history = options.history;
    this.registry = options.registry;
    this.client = options.client;
    this.persona = options.persona;
    this.maxToolIterations = options.maxToolIterations ?? 4;
    this.maxContextTurns = options.maxContextTurns ?? 5;
    this.modelTimeoutMs = options.modelTimeoutMs ?? 60_000;
    this.channelCapacity = options.channelCapacity ?? 16;
    this.stream = options.stream ?? true;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
    if (this.maxToolIterations < 1) {
      throw new RangeError("maxToolIterations must be at least 1");
    }
  }

  /**
   * Run one turn. The turn starts when iteration begins; the stream yields
   * content as it arrives and ends with exactly one `done` or `error`.
   *
   * When the consumer stops early, forwarding stops but the in-flight model
   * response is still consumed: a final answer is still persisted, a tool
   * request is dropped without being persisted, and a tool batch already
   * dispatching completes and is persisted. No further model call is made.
   * `finished` only settles for a stream that was iterated.
   */
  runTurn(
    conversationId: string,
    userText: string,
    options: RunTurnOptions = {},
  ): TurnStream {
    let started = false;
    let markFinished: () => void = () => undefined;
    const finished = new Promise<void>((resolve) => {
      markFinished = resolve;
    });
    return {
      finished,
      [Symbol.asyncIterator]: () => {
        if (started) {
          throw new Error("A turn stream can only be iterated once");
        }
        started = true;
        const channel = new OutputChannel<OutputEvent>(this.channelCapacity, options.signal);
        const turnId = uuidv4();
        const run: TurnRun = {
          turnId,
          conversationId,
          userText,
          persona: options.persona ?? this.persona,
          maxToolIterations: options.maxToolIterations ?? this.maxToolIterations,
          maxContextTurns: options.maxContextTurns ?? this.maxContextTurns,
          channel,
          state: null,
          modelCalls: 0,
          toolIterations: 0,
          log: this.logger.with({ turnId, conversationId }),
        };
        this.drive(run).then(markFinished, (error: unknown) => {
          run.log.error("turn.crashed", { error: errorMessage(error) });
          channel.fail(error);
          markFinished();
        });
        return channel[Symbol.asyncIterator]();
      },
    };
  }

  private async drive(run: TurnRun): Promise<void> {
    const started = Date.now();
    const { conversationId, channel } = run;
    let outcome: TurnOutcome = "completed";

    run.log.info("turn.start", { message: summarizeForLog(run.userText, 100) });

    try {
      this.enter(run, "BUILD_CONTEXT");
      const prior = await this.history.getContext(conversationId, run.maxContextTurns);
      const user = await this.history.appendMessage(conversationId, userMessage(run.userText));
      const context: Message[] = [systemMessage(run.persona), ...prior, user];
      const tools = this.registry.describeAll();

      for (;;) {
        this.enter(run, "AWAIT_MODEL");
        const response = await this.awaitModel(run, context, tools);

        if (response.kind === "final") {
          await this.history.appendMessage(conversationId, assistantMessage(response.content));
          if (channel.isCancelled) outcome = "cancelled";
          break;
        }

        if (channel.isCancelled) {
          outcome = "cancelled";
          break;
        }

        const assistant = await this.history.appendMessage(
          conversationId,
          assistantMessage(response.content || null, response.calls),
        );
        context.push(assistant);

        this.enter(run, "DISPATCH_TOOLS");
        for (const call of response.calls) {
          const result = await this.registry.dispatch(call, { conversationId });
          await this.history.appendToolResult(conversationId, result);
          context.push(
            await this.history.appendMessage(
              conversationId,
              toolMessage(call.id, call.name, renderToolResult(result)),
            ),
          );
        }
        run.toolIterations++;

        if (channel.isCancelled) {
          outcome = "cancelled";
          break;
        }

        if (run.toolIterations >= run.maxToolIterations) {
          run.log.warn("turn.budget_exhausted", { iterations: run.toolIterations });
          await channel.push({ type: "content", text: TOOL_BUDGET_FALLBACK });
          await this.history.appendMessage(conversationId, assistantMessage(TOOL_BUDGET_FALLBACK));
          outcome = "budget_exhausted";
          break;
        }
      }

      if (outcome !== "cancelled") {
        this.enter(run, "EMIT_FINAL");
        await channel.push({ type: "done" });
      }
      this.enter(run, "DONE");
    } catch (error) {
      outcome = "failed";
      this.enter(run, "FAILED");
      const failure = describeFailure(error);
      run.log.error("turn.failed", { kind: failure.kind, error: failure.message });
      await channel.push({ type: "error", message: failure.message, kind: failure.kind });
    } finally {
      channel.close();
    }

    const summary: TurnSummary = {
      turnId: run.turnId,
      conversationId,
      outcome,
      modelCalls: run.modelCalls,
      toolIterations: run.toolIterations,
      durationMs: Date.now() - started,
    };
    this.metrics?.recordTurn(outcome, summary.durationMs);
    run.log.info("turn.done", {
      outcome,
      modelCalls: summary.modelCalls,
      toolIterations: summary.toolIterations,
      durationMs: summary.durationMs,
    });
    this.emit("turnFinished", summary);
  }

  private async awaitModel(
    run: TurnRun,
    context: Message[],
    tools: ToolSpec[],
  ): Promise<ModelResponse> {
    const controller = new AbortController();
    run.modelCalls++;
    run.log.debug("turn.model_call", { call: run.modelCalls, messages: context.length });

    const events = this.client.complete({
      messages: [...context],
      tools,
      stream: this.stream,
      signal: controller.signal,
    });
    const iterator = events[Symbol.asyncIterator]();

    let content = "";
    const calls: ToolCall[] = [];
    let ok = false;

    try {
      for (;;) {
        const step = await pTimeout(iterator.next(), {
          milliseconds: this.modelTimeoutMs,
          message: new ModelCallFailedError(`timed out after ${this.modelTimeoutMs}ms`),
        });
        if (step.done) {
          throw new ModelCallFailedError("completion ended without a terminal event");
        }

        const event = step.value;
        switch (event.type) {
          case "content_delta":
            content += event.text;
            if (!run.channel.isCancelled) {
              await run.channel.push({ type: "content", text: event.text });
            }
            break;
          case "tool_call":
            calls.push(event.call);
            break;
          case "completed":
            ok = true;
            return calls.length > 0 ? { kind: "tools", content, calls } : { kind: "final", content };
          case "failed":
            throw new ModelCallFailedError(event.reason);
        }
      }
    } finally {
      this.metrics?.recordModelCall(ok);
      if (!ok) controller.abort();
      const release = iterator.return?.();
      if (release) {
        release.catch((error: unknown) => {
          run.log.debug("turn.model_release_failed", { error: errorMessage(error) });
        });
      }
    }
  }

  private enter(run: TurnRun, to: TurnState): void {
    const transition: TurnTransition = {
      turnId: run.turnId,
      conversationId: run.conversationId,
      from: run.state,
      to,
      timestamp: new Date().toISOString(),
    };
    run.state = to;
    run.log.trace("turn.transition", { from: transition.from, to });
    this.emit("transition", transition);
  }
}

function describeFailure(error: unknown): { kind: TurnFailureKind; message: string } {
  if (error instanceof AgentRuntimeError) {
    switch (error.kind) {
      case "STORAGE_UNAVAILABLE":
      case "MODEL_CALL_FAILED":
      case "CONVERSATION_BUSY":
        return { kind: error.kind, message: error.message };
    }
  }
  return { kind: "INTERNAL", message: `Internal error: ${errorMessage(error)}` };
}
