/**
 * Conversation roles. `system` messages are built per turn from the persona
 * and are never persisted.
 */
export type Role = "system" | "user" | "assistant" | "tool";

/**
 * A tool invocation requested by the model.
 * `id` is unique within a turn and links the call to its `tool` message.
 */
export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * A conversation message as seen by the engine and the completion client.
 */
export interface Message {
  role: Role;
  content: string | null;
  toolCalls: ToolCall[];
  /** Set on `tool` messages only: the id of the call this result answers */
  toolCallId?: string;
  /** Tool name, for `tool` messages */
  name?: string;
}

/**
 * A message as persisted by a history store.
 */
export interface StoredMessage extends Message {
  id: string;
  createdAt: string; // ISO 8601
}

export function systemMessage(content: string): Message {
  return { role: "system", content, toolCalls: [] };
}

export function userMessage(content: string): Message {
  return { role: "user", content, toolCalls: [] };
}

export function assistantMessage(
  content: string | null,
  toolCalls: ToolCall[] = [],
): Message {
  return { role: "assistant", content, toolCalls };
}

export function toolMessage(
  toolCallId: string,
  name: string,
  content: string,
): Message {
  return { role: "tool", content, toolCalls: [], toolCallId, name };
}
