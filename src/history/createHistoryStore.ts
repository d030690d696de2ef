import type { StorageConfig } from "../config/AgentConfig.js";
import { ConfigError } from "../core/errors.js";
import type { Logger } from "../observability/Logger.js";
import type { Metrics } from "../observability/Metrics.js";
import type { HistoryStore } from "./HistoryStore.js";
import { InMemoryHistoryStore } from "./InMemoryHistoryStore.js";
import {
  RedisHistoryStore,
  createRedisClient,
  fromIoredis,
  type RedisListClient,
} from "./RedisHistoryStore.js";

export interface CreateHistoryStoreOptions {
  logger?: Logger;
  metrics?: Metrics;
  /** Use this client instead of connecting to `storage.redisUrl` */
  redisClient?: RedisListClient;
}

/**
 * Build the history backend named by the storage config.
 */
export function createHistoryStore(
  storage: StorageConfig,
  options: CreateHistoryStoreOptions = {},
): HistoryStore {
  switch (storage.type) {
    case "memory":
      return new InMemoryHistoryStore({ maxToolResults: storage.maxToolResults });
    case "redis": {
      let client = options.redisClient;
      if (!client) {
        if (!storage.redisUrl) {
          throw new ConfigError("storage.redisUrl is required for the redis backend");
        }
        client = fromIoredis(createRedisClient(storage.redisUrl));
      }
      return new RedisHistoryStore({
        client,
        keyPrefix: storage.keyPrefix,
        ttlSeconds: storage.ttlSeconds,
        maxToolResults: storage.maxToolResults,
        retries: storage.retries,
        logger: options.logger?.child("storage"),
        metrics: options.metrics,
      });
    }
  }
}
