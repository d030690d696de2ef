import { v4 as uuidv4 } from "uuid";
import type { Message, StoredMessage, ToolCall } from "../types/Message.js";
import type { ToolResult } from "../types/ToolResult.js";

export interface StorageHealth {
  status: "healthy" | "unhealthy";
  backend: string;
  latencyMs?: number;
  error?: string;
}

/**
 * Durable per-conversation storage of messages and tool results.
 * Backends reject with StorageUnavailableError when they cannot be reached;
 * they never reorder, mutate or silently drop entries.
 */
export interface HistoryStore {
  readonly backend: string;
  appendMessage(conversationId: string, message: Message): Promise<StoredMessage>;
  appendToolResult(conversationId: string, result: ToolResult): Promise<void>;
  /** The last `maxTurns` exchanges, oldest first, never split mid-exchange */
  getContext(conversationId: string, maxTurns: number): Promise<StoredMessage[]>;
  /** Full message log, unwindowed and unrepaired */
  getMessages(conversationId: string): Promise<StoredMessage[]>;
  /** Tool-result audit log, oldest first; the last `limit` records when given */
  getToolResults(conversationId: string, limit?: number): Promise<ToolResult[]>;
  healthCheck(): Promise<StorageHealth>;
  close(): Promise<void>;
}

export function toStoredMessage(message: Message): StoredMessage {
  return {
    id: uuidv4(),
    createdAt: new Date().toISOString(),
    role: message.role,
    content: message.content,
    toolCalls: copyToolCalls(message.toolCalls),
    ...(message.toolCallId !== undefined ? { toolCallId: message.toolCallId } : {}),
    ...(message.name !== undefined ? { name: message.name } : {}),
  };
}

/**
 * Copy of a stored message that shares nothing with the original,
 * tool-call arguments included.
 */
export function copyStoredMessage(message: StoredMessage): StoredMessage {
  return { ...message, toolCalls: copyToolCalls(message.toolCalls) };
}

function copyToolCalls(calls: readonly ToolCall[]): ToolCall[] {
  return calls.map((call) => ({ ...call, arguments: structuredClone(call.arguments) }));
}

/**
 * Build the model context window from a full message log.
 */
export function buildContextWindow(
  messages: StoredMessage[],
  maxTurns: number,
): StoredMessage[] {
  return repairToolSequences(selectRecentTurns(messages, maxTurns));
}

/**
 * Keep the last `maxTurns` exchanges. An exchange opens at a `user` message and
 * runs up to the next one; anything before the first `user` message is dropped.
 */
export function selectRecentTurns(
  messages: StoredMessage[],
  maxTurns: number,
): StoredMessage[] {
  if (maxTurns <= 0) return [];

  const turns: StoredMessage[][] = [];
  for (const message of messages) {
    if (message.role === "user") {
      turns.push([message]);
    } else if (turns.length > 0) {
      turns[turns.length - 1].push(message);
    }
  }
  return turns.slice(-maxTurns).flat();
}

/**
 * Drop tool sequences the model API would reject: `tool` messages that answer
 * no preceding call, and assistant tool-call messages whose calls are not all
 * answered (together with their partial results).
 */
export function repairToolSequences(messages: StoredMessage[]): StoredMessage[] {
  const out: StoredMessage[] = [];
  let i = 0;

  while (i < messages.length) {
    const message = messages[i];

    if (message.role === "tool") {
      i++;
      continue;
    }

    if (message.role !== "assistant" || message.toolCalls.length === 0) {
      out.push(message);
      i++;
      continue;
    }

    const callIds = new Set(message.toolCalls.map((call) => call.id));
    const results: StoredMessage[] = [];
    let j = i + 1;
    while (j < messages.length && messages[j].role === "tool") {
      const candidate = messages[j];
      if (candidate.toolCallId !== undefined && callIds.has(candidate.toolCallId)) {
        results.push(candidate);
      }
      j++;
    }

    const answered = new Set(results.map((r) => r.toolCallId));
    if ([...callIds].every((id) => answered.has(id))) {
      out.push(message, ...results);
    }
    i = j;
  }

  return out;
}
