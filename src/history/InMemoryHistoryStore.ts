import type { Message, StoredMessage } from "../types/Message.js";
import type { ToolResult } from "../types/ToolResult.js";
import {
  buildContextWindow,
  copyStoredMessage,
  toStoredMessage,
  type HistoryStore,
  type StorageHealth,
} from "./HistoryStore.js";

export interface InMemoryHistoryStoreOptions {
  /** Keep at most this many tool results per conversation */
  maxToolResults?: number;
}

/**
 * In-memory history store (default, for development and testing).
 * Volatile: contents are lost with the process.
 */
export class InMemoryHistoryStore implements HistoryStore {
  readonly backend = "memory";
  private readonly messages = new Map<string, StoredMessage[]>();
  private readonly toolResults = new Map<string, ToolResult[]>();
  private readonly maxToolResults?: number;

  constructor(options: InMemoryHistoryStoreOptions = {}) {
    this.maxToolResults = options.maxToolResults;
  }

  async appendMessage(conversationId: string, message: Message): Promise<StoredMessage> {
    const stored = toStoredMessage(message);
    const log = this.messages.get(conversationId) ?? [];
    log.push(stored);
    this.messages.set(conversationId, log);
    return copyStoredMessage(stored);
  }

  async appendToolResult(conversationId: string, result: ToolResult): Promise<void> {
    const log = this.toolResults.get(conversationId) ?? [];
    log.push({ ...result });
    if (this.maxToolResults !== undefined && log.length > this.maxToolResults) {
      log.splice(0, log.length - this.maxToolResults);
    }
    this.toolResults.set(conversationId, log);
  }

  async getContext(conversationId: string, maxTurns: number): Promise<StoredMessage[]> {
    const log = this.messages.get(conversationId) ?? [];
    return buildContextWindow(log, maxTurns).map(copyStoredMessage);
  }

  async getToolResults(conversationId: string, limit?: number): Promise<ToolResult[]> {
    const log = this.toolResults.get(conversationId) ?? [];
    const selected = limit === undefined ? log : limit > 0 ? log.slice(-limit) : [];
    return selected.map((r) => ({ ...r }));
  }

  /** Full message log of a conversation, unwindowed. */
  async getMessages(conversationId: string): Promise<StoredMessage[]> {
    return (this.messages.get(conversationId) ?? []).map(copyStoredMessage);
  }

  async healthCheck(): Promise<StorageHealth> {
    return { status: "healthy", backend: this.backend, latencyMs: 0 };
  }

  async close(): Promise<void> {
    // nothing to release
  }

  get conversationCount(): number {
    return this.messages.size;
  }

  clear(): void {
    this.messages.clear();
    this.toolResults.clear();
  }
}
