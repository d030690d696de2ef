import { Redis } from "ioredis";
import type { z } from "zod";
import type { Message, StoredMessage } from "../types/Message.js";
import type { ToolResult } from "../types/ToolResult.js";
import { StorageUnavailableError, errorMessage } from "../core/errors.js";
import { withRetry } from "../core/Retry.js";
import { silentLogger, type Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";
import {
  buildContextWindow,
  toStoredMessage,
  type HistoryStore,
  type StorageHealth,
} from "./HistoryStore.js";
import { storedMessageSchema, toolResultSchema } from "./records.js";

/**
 * The list commands the store needs. `fromIoredis` adapts an ioredis client.
 */
export interface RedisListClient {
  rpush(key: string, value: string): Promise<number>;
  expire(key: string, seconds: number): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  ltrim(key: string, start: number, stop: number): Promise<void>;
  ping(): Promise<string>;
  quit(): Promise<void>;
}

export interface RedisHistoryStoreOptions {
  client: RedisListClient;
  /** Key namespace (default: "agent") */
  keyPrefix?: string;
  /** Expiry refreshed on every append (default: 30 days) */
  ttlSeconds?: number;
  /** Keep at most this many tool results per conversation */
  maxToolResults?: number;
  /** Retries after a failed command (default: 3) */
  retries?: number;
  /** Base backoff delay in ms (default: 100) */
  retryBaseDelayMs?: number;
  logger?: Logger;
  metrics?: Metrics;
}

const DEFAULT_TTL_SECONDS = 30 * 24 * 60 * 60;

/**
 * Redis-backed history store: one list per log, JSON records, RPUSH then EXPIRE.
 */
export class RedisHistoryStore implements HistoryStore {
  readonly backend = "redis";
  private readonly client: RedisListClient;
  private readonly keyPrefix: string;
  private readonly ttlSeconds: number;
  private readonly maxToolResults?: number;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;
  private readonly logger: Logger;
  private readonly metrics?: Metrics;

  constructor(options: RedisHistoryStoreOptions) {
    this.client = options.client;
    this.keyPrefix = options.keyPrefix ?? "agent";
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.maxToolResults = options.maxToolResults;
    this.retries = options.retries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 100;
    this.logger = options.logger ?? silentLogger;
    this.metrics = options.metrics;
  }

  messagesKey(conversationId: string): string {
    return `${this.keyPrefix}:history:${conversationId}`;
  }

  toolResultsKey(conversationId: string): string {
    return `${this.keyPrefix}:tools:${conversationId}`;
  }

  async appendMessage(conversationId: string, message: Message): Promise<StoredMessage> {
    const stored = toStoredMessage(message);
    const key = this.messagesKey(conversationId);
    // Retried per command: a retry never repeats an earlier command.
    await this.run("appendMessage", () => this.client.rpush(key, JSON.stringify(stored)));
    await this.run("appendMessage", () => this.client.expire(key, this.ttlSeconds));
    return stored;
  }

  async appendToolResult(conversationId: string, result: ToolResult): Promise<void> {
    const key = this.toolResultsKey(conversationId);
    await this.run("appendToolResult", () => this.client.rpush(key, JSON.stringify(result)));
    const cap = this.maxToolResults;
    if (cap !== undefined) {
      await this.run("appendToolResult", () => this.client.ltrim(key, -cap, -1));
    }
    await this.run("appendToolResult", () => this.client.expire(key, this.ttlSeconds));
  }

  async getContext(conversationId: string, maxTurns: number): Promise<StoredMessage[]> {
    if (maxTurns <= 0) return [];
    return buildContextWindow(await this.getMessages(conversationId), maxTurns);
  }

  async getMessages(conversationId: string): Promise<StoredMessage[]> {
    const key = this.messagesKey(conversationId);
    const raw = await this.run("getMessages", () => this.client.lrange(key, 0, -1));
    return this.parseRecords(key, raw, storedMessageSchema);
  }

  async getToolResults(conversationId: string, limit?: number): Promise<ToolResult[]> {
    if (limit !== undefined && limit <= 0) return [];
    const key = this.toolResultsKey(conversationId);
    const start = limit === undefined ? 0 : -limit;
    const raw = await this.run("getToolResults", () => this.client.lrange(key, start, -1));
    return this.parseRecords(key, raw, toolResultSchema);
  }

  async healthCheck(): Promise<StorageHealth> {
    const started = Date.now();
    try {
      await this.client.ping();
      return { status: "healthy", backend: this.backend, latencyMs: Date.now() - started };
    } catch (error) {
      return { status: "unhealthy", backend: this.backend, error: errorMessage(error) };
    }
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        maxRetries: this.retries,
        baseDelayMs: this.retryBaseDelayMs,
        maxDelayMs: 2_000,
        onRetry: (error, attempt) => {
          this.metrics?.recordRetry("storage");
          this.logger.warn("storage.retry", { operation, attempt, error: error.message });
        },
      });
    } catch (error) {
      this.logger.error("storage.unavailable", { operation, error: errorMessage(error) });
      throw new StorageUnavailableError(operation, error);
    }
  }

  private parseRecords<S extends z.ZodTypeAny>(
    key: string,
    raw: string[],
    schema: S,
  ): z.output<S>[] {
    const records: z.output<S>[] = [];
    for (const [index, entry] of raw.entries()) {
      let decoded: unknown;
      try {
        decoded = JSON.parse(entry);
      } catch (error) {
        this.logger.warn("storage.record_skipped", { key, index, error: errorMessage(error) });
        continue;
      }
      const parsed = schema.safeParse(decoded);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        this.logger.warn("storage.record_skipped", { key, index, error: parsed.error.message });
      }
    }
    return records;
  }
}

/**
 * Adapt an ioredis client to the commands the store uses.
 */
export function fromIoredis(redis: Redis): RedisListClient {
  return {
    rpush: (key, value) => redis.rpush(key, value),
    expire: (key, seconds) => redis.expire(key, seconds),
    lrange: (key, start, stop) => redis.lrange(key, start, stop),
    ltrim: async (key, start, stop) => {
      await redis.ltrim(key, start, stop);
    },
    ping: () => redis.ping(),
    quit: async () => {
      await redis.quit();
    },
  };
}

/**
 * Connect lazily: the first command opens the connection.
 */
export function createRedisClient(url: string): Redis {
  return new Redis(url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
  });
}
