import { EventEmitter } from "eventemitter3";
import { errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../observability/Logger.js";
import type { Agent } from "./Agent.js";

export type EvictionReason = "capacity" | "expired" | "removed";

export interface AgentCacheEvents {
  evicted: (event: { key: string; reason: EvictionReason }) => void;
}

export interface AgentCacheOptions {
  /** Most agents kept at once (default: 100) */
  maxAgents?: number;
  /** Idle time after which an agent is dropped, in ms (default: 30 min) */
  ttlMs?: number;
  now?: () => number;
  logger?: Logger;
}

interface CacheEntry {
  agent: Agent;
  lastUsedAt: number;
}

/** Unambiguous for any kind and id, including ones containing ":". */
export function agentCacheKey(kind: string, agentId?: string): string {
  return JSON.stringify(agentId ? [kind, agentId] : [kind]);
}

/**
 * LRU cache of agent instances with idle expiry. Evicted agents are closed.
 */
export class AgentCache extends EventEmitter<AgentCacheEvents> {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxAgents: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: AgentCacheOptions = {}) {
    super();
    this.maxAgents = options.maxAgents ?? 100;
    this.ttlMs = options.ttlMs ?? 30 * 60 * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Return the cached agent for `key`, creating it on a miss.
   */
  getOrCreate(key: string, create: () => Agent): Agent {
    this.prune();
    const hit = this.entries.get(key);
    if (hit) {
      this.entries.delete(key);
      hit.lastUsedAt = this.now();
      this.entries.set(key, hit);
      return hit.agent;
    }

    const agent = create();
    this.entries.set(key, { agent, lastUsedAt: this.now() });
    while (this.entries.size > this.maxAgents) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.evict(oldest.value, "capacity");
    }
    return agent;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get size(): number {
    return this.entries.size;
  }

  keys(): string[] {
    return [...this.entries.keys()];
  }

  /** Drop entries idle for longer than the TTL. */
  prune(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [key, entry] of this.entries) {
      if (entry.lastUsedAt <= cutoff) this.evict(key, "expired");
    }
  }

  async delete(key: string): Promise<boolean> {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    this.emit("evicted", { key, reason: "removed" });
    await entry.agent.close();
    return true;
  }

  async clear(): Promise<void> {
    const entries = [...this.entries.entries()];
    this.entries.clear();
    await Promise.all(
      entries.map(async ([key, entry]) => {
        this.emit("evicted", { key, reason: "removed" });
        await entry.agent.close();
      }),
    );
  }

  private evict(key: string, reason: EvictionReason): void {
    const entry = this.entries.get(key);
    if (!entry) return;
    this.entries.delete(key);
    this.logger.debug("cache.evicted", { key, reason });
    this.emit("evicted", { key, reason });
    entry.agent.close().catch((error: unknown) => {
      this.logger.warn("cache.close_failed", { key, error: errorMessage(error) });
    });
  }
}
