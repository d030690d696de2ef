// === Types ===
export * from "./types/index.js";

// === Core ===
export {
  AgentRuntimeError,
  StorageUnavailableError,
  DuplicateToolNameError,
  InvalidToolSpecError,
  UnknownToolError,
  ToolTimeoutError,
  ModelCallFailedError,
  UnknownAgentKindError,
  ConfigError,
  TurnFailedError,
  errorMessage,
} from "./core/errors.js";
export type { ErrorKind } from "./core/errors.js";
export { withRetry, isRetryable } from "./core/Retry.js";
export type { RetryOptions } from "./core/Retry.js";
export { SchemaValidator } from "./core/SchemaValidator.js";
export type { ValidationResult } from "./core/SchemaValidator.js";

// === Config ===
export {
  loadConfig,
  parseConfig,
  configFromEnv,
  agentRuntimeConfigSchema,
  DEFAULT_CONFIG_FILE,
} from "./config/AgentConfig.js";
export type {
  AgentRuntimeConfig,
  ModelConfig,
  StorageConfig,
  EngineConfig,
  CacheConfig,
  LoadConfigOptions,
} from "./config/AgentConfig.js";

// === Registry ===
export { ToolRegistry } from "./registry/ToolRegistry.js";
export type { ToolRegistryOptions, DispatchOptions } from "./registry/ToolRegistry.js";

// === History ===
export type { HistoryStore, StorageHealth } from "./history/HistoryStore.js";
export {
  buildContextWindow,
  selectRecentTurns,
  repairToolSequences,
} from "./history/HistoryStore.js";
export { InMemoryHistoryStore } from "./history/InMemoryHistoryStore.js";
export { RedisHistoryStore, createRedisClient, fromIoredis } from "./history/RedisHistoryStore.js";
export type { RedisListClient, RedisHistoryStoreOptions } from "./history/RedisHistoryStore.js";
export { createHistoryStore } from "./history/createHistoryStore.js";

// === Model ===
export type { CompletionClient, CompletionRequest } from "./llm/CompletionClient.js";
export {
  OpenAICompatibleClient,
  createOpenAICompatibleClient,
} from "./llm/OpenAICompatibleClient.js";
export type { OpenAICompatibleClientConfig } from "./llm/OpenAICompatibleClient.js";

// === Engine ===
export { TurnEngine, TOOL_BUDGET_FALLBACK } from "./engine/TurnEngine.js";
export type { TurnEngineOptions, RunTurnOptions, TurnStream } from "./engine/TurnEngine.js";
export { OutputChannel } from "./engine/OutputChannel.js";

// === Agents ===
export { BaseAgent, collectReply } from "./agent/Agent.js";
export type {
  Agent,
  AgentDefinition,
  AgentDependencies,
  ProcessMessageOptions,
} from "./agent/Agent.js";
export { AgentKindRegistry, createDefaultAgentKinds } from "./agent/AgentKindRegistry.js";
export type { AgentFactory, AgentKindInfo } from "./agent/AgentKindRegistry.js";
export { AgentCache, agentCacheKey } from "./agent/AgentCache.js";
export { ConversationGate } from "./agent/ConversationGate.js";
export { AgentService, createAgentService } from "./agent/AgentService.js";
export type { ChatTurnRequest, ServiceInfo } from "./agent/AgentService.js";
export {
  CustomerServiceAgent,
  CUSTOMER_SERVICE_KIND,
} from "./agents/customer-service/CustomerServiceAgent.js";
export { TicketStore } from "./agents/customer-service/TicketStore.js";
export { FaqIndex, loadFaqEntries } from "./agents/customer-service/FaqSearch.js";

// === Server ===
export { buildServer, startServer } from "./server/server.js";

// === Observability ===
export { createLogger, silentLogger, parseLogLevel } from "./observability/Logger.js";
export type { Logger, LogLevel, LoggerOptions } from "./observability/Logger.js";
export { Metrics } from "./observability/Metrics.js";
export type { MetricsSnapshot } from "./observability/Metrics.js";
