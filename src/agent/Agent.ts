import type { AgentRuntimeConfig } from "../config/AgentConfig.js";
import { TurnFailedError } from "../core/errors.js";
import type { HistoryStore } from "../history/HistoryStore.js";
import type { CompletionClient } from "../llm/CompletionClient.js";
import { ToolRegistry } from "../registry/ToolRegistry.js";
import { TurnEngine, type RunTurnOptions, type TurnStream } from "../engine/TurnEngine.js";
import type { OutputEvent, TurnSummary } from "../types/Events.js";
import type { AgentTool, ToolSpec } from "../types/ToolSpec.js";
import { silentLogger, type Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";

/**
 * Shared services an agent is built from.
 */
export interface AgentDependencies {
  config: AgentRuntimeConfig;
  history: HistoryStore;
  client: CompletionClient;
  logger?: Logger;
  metrics?: Metrics;
}

export interface AgentDefinition {
  kind: string;
  name: string;
  persona: string;
  tools: AgentTool[];
}

export type ProcessMessageOptions = Pick<
  RunTurnOptions,
  "signal" | "persona" | "maxToolIterations"
>;

export interface Agent {
  readonly kind: string;
  readonly name: string;
  describeTools(): ToolSpec[];
  processMessage(
    text: string,
    conversationId: string,
    options?: ProcessMessageOptions,
  ): TurnStream;
  close(): Promise<void>;
}

/**
 * Binds a persona, a tool registry and a turn engine.
 * Tools are registered once, here; a duplicate name fails construction.
 */
export class BaseAgent implements Agent {
  readonly kind: string;
  readonly name: string;
  protected readonly registry: ToolRegistry;
  protected readonly engine: TurnEngine;
  protected readonly logger: Logger;

  constructor(deps: AgentDependencies, definition: AgentDefinition) {
    const { config } = deps;
    this.kind = definition.kind;
    this.name = definition.name;
    this.logger = (deps.logger ?? silentLogger).child(definition.kind);

    this.registry = new ToolRegistry({
      toolTimeoutMs: config.engine.toolTimeoutMs,
      toolRetries: config.engine.toolRetries,
      logger: this.logger,
      metrics: deps.metrics,
    });
    for (const tool of definition.tools) {
      this.registry.register(tool.spec, tool.handler);
    }

    this.engine = new TurnEngine({
      history: deps.history,
      registry: this.registry,
      client: deps.client,
      persona: definition.persona,
      maxToolIterations: config.engine.maxToolIterations,
      maxContextTurns: config.engine.maxContextTurns,
      modelTimeoutMs: config.model.timeoutMs,
      channelCapacity: config.engine.channelCapacity,
      stream: config.model.stream,
      logger: this.logger,
      metrics: deps.metrics,
    });
  }

  describeTools(): ToolSpec[] {
    return this.registry.describeAll();
  }

  processMessage(
    text: string,
    conversationId: string,
    options: ProcessMessageOptions = {},
  ): TurnStream {
    return this.engine.runTurn(conversationId, text, options);
  }

  /** Subscribe to per-turn summaries. Returns an unsubscribe function. */
  onTurnFinished(listener: (summary: TurnSummary) => void): () => void {
    this.engine.on("turnFinished", listener);
    return () => {
      this.engine.off("turnFinished", listener);
    };
  }

  async close(): Promise<void> {
    this.engine.removeAllListeners();
    this.logger.debug("agent.closed", { agent: this.name });
  }
}

/**
 * Drain a turn stream into its full reply text.
 * Throws TurnFailedError if the turn ended with an `error` event.
 */
export async function collectReply(events: AsyncIterable<OutputEvent>): Promise<string> {
  let content = "";
  for await (const event of events) {
    switch (event.type) {
      case "content":
        content += event.text;
        break;
      case "error":
        throw new TurnFailedError(event.kind, event.message);
      case "done":
        return content;
    }
  }
  return content;
}
