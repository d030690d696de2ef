import type { AgentRuntimeConfig } from "../config/AgentConfig.js";
import type { HistoryStore, StorageHealth } from "../history/HistoryStore.js";
import { createHistoryStore, type CreateHistoryStoreOptions } from "../history/createHistoryStore.js";
import type { CompletionClient } from "../llm/CompletionClient.js";
import { OpenAICompatibleClient } from "../llm/OpenAICompatibleClient.js";
import { createLogger, type Logger } from "../observability/Logger.js";
import { Metrics, type MetricsSnapshot } from "../observability/Metrics.js";
import type { OutputEvent } from "../types/Events.js";
import type { Agent, AgentDependencies, ProcessMessageOptions } from "./Agent.js";
import { AgentCache, agentCacheKey } from "./AgentCache.js";
import { createDefaultAgentKinds, type AgentKindInfo, type AgentKindRegistry } from "./AgentKindRegistry.js";
import { ConversationGate } from "./ConversationGate.js";

export interface AgentServiceOptions {
  config: AgentRuntimeConfig;
  history: HistoryStore;
  client: CompletionClient;
  kinds?: AgentKindRegistry;
  logger?: Logger;
  metrics?: Metrics;
  /** Clock for the agent cache */
  now?: () => number;
}

export interface ChatTurnRequest extends ProcessMessageOptions {
  agentKind: string;
  /** Agents are cached per kind and id; omit to share one per kind */
  agentId?: string;
  conversationId: string;
  message: string;
}

export interface ServiceInfo {
  agentKinds: AgentKindInfo[];
  defaultAgentKind: string;
  storage: string;
  cachedAgents: number;
  activeConversations: number;
  metrics: MetricsSnapshot;
}

/**
 * Entry point for transports: resolves the agent, serializes turns per
 * conversation and owns the shared history store and completion client.
 */
export class AgentService {
  readonly config: AgentRuntimeConfig;
  readonly history: HistoryStore;
  readonly metrics: Metrics;
  private readonly client: CompletionClient;
  private readonly kinds: AgentKindRegistry;
  private readonly cache: AgentCache;
  private readonly gate: ConversationGate;
  private readonly logger: Logger;

  constructor(options: AgentServiceOptions) {
    this.config = options.config;
    this.history = options.history;
    this.client = options.client;
    this.kinds = options.kinds ?? createDefaultAgentKinds();
    this.logger = options.logger ?? createLogger({ level: options.config.logLevel });
    this.metrics = options.metrics ?? new Metrics();
    this.cache = new AgentCache({
      maxAgents: options.config.cache.maxAgents,
      ttlMs: options.config.cache.ttlMs,
      now: options.now,
      logger: this.logger.child("cache"),
    });
    this.gate = new ConversationGate({
      maxQueued: options.config.cache.maxQueuedTurnsPerConversation,
      logger: this.logger,
    });
  }

  hasAgentKind(kind: string): boolean {
    return this.kinds.has(kind);
  }

  /**
   * Cached agent for (kind, id). Throws UnknownAgentKindError for an unknown kind.
   */
  getAgent(kind: string, agentId?: string): Agent {
    const deps: AgentDependencies = {
      config: this.config,
      history: this.history,
      client: this.client,
      logger: this.logger,
      metrics: this.metrics,
    };
    return this.cache.getOrCreate(agentCacheKey(kind, agentId), () => {
      this.logger.info("agent.created", { kind, agentId });
      return this.kinds.create(kind, deps);
    });
  }

  /**
   * Stream one turn. Turns of the same conversation run one at a time.
   */
  chat(request: ChatTurnRequest): AsyncIterable<OutputEvent> {
    const agent = this.getAgent(request.agentKind, request.agentId);
    return this.gate.run(request.conversationId, () =>
      agent.processMessage(request.message, request.conversationId, {
        signal: request.signal,
        persona: request.persona,
        maxToolIterations: request.maxToolIterations,
      }),
    );
  }

  async removeAgent(kind: string, agentId?: string): Promise<boolean> {
    return this.cache.delete(agentCacheKey(kind, agentId));
  }

  healthCheck(): Promise<StorageHealth> {
    return this.history.healthCheck();
  }

  info(): ServiceInfo {
    return {
      agentKinds: this.kinds.list(),
      defaultAgentKind: this.config.defaultAgentKind,
      storage: this.history.backend,
      cachedAgents: this.cache.size,
      activeConversations: this.gate.activeConversations,
      metrics: this.metrics.snapshot(),
    };
  }

  async shutdown(): Promise<void> {
    await this.cache.clear();
    await this.history.close();
    this.logger.info("service.shutdown");
  }
}

export interface CreateAgentServiceOverrides extends CreateHistoryStoreOptions {
  history?: HistoryStore;
  client?: CompletionClient;
  kinds?: AgentKindRegistry;
}

/**
 * Wire a service from config: history backend, OpenAI-compatible client,
 * default agent kinds.
 */
export function createAgentService(
  config: AgentRuntimeConfig,
  overrides: CreateAgentServiceOverrides = {},
): AgentService {
  const logger = overrides.logger ?? createLogger({ level: config.logLevel });
  const metrics = overrides.metrics ?? new Metrics();
  const history =
    overrides.history ??
    createHistoryStore(config.storage, {
      logger,
      metrics,
      redisClient: overrides.redisClient,
    });
  const client =
    overrides.client ??
    new OpenAICompatibleClient({
      baseUrl: config.model.baseUrl,
      model: config.model.name,
      apiKey: config.model.apiKey,
      temperature: config.model.temperature,
      timeoutMs: config.model.timeoutMs,
      logger: logger.child("model"),
    });
  return new AgentService({
    config,
    history,
    client,
    kinds: overrides.kinds,
    logger,
    metrics,
  });
}
