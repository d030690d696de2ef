import type { Message } from "../types/Message.js";
import type { ToolSpec } from "../types/ToolSpec.js";
import type { CompletionEvent } from "../types/Events.js";

export interface CompletionRequest {
  messages: Message[];
  tools: ToolSpec[];
  /** Ask for incremental content; clients without streaming may ignore it */
  stream: boolean;
  /** Aborts the underlying call; the sequence then ends with `failed` */
  signal?: AbortSignal;
}

/**
 * Language-model call. The returned sequence is lazy, finite and single-use,
 * and ends with exactly one `completed` or `failed` event.
 * `tool_call` events, when any, arrive after all content deltas.
 */
export interface CompletionClient {
  complete(request: CompletionRequest): AsyncIterable<CompletionEvent>;
}
