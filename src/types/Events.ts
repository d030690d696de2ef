import type { ToolCall } from "./Message.js";

/**
 * Events yielded by a completion client for one model call.
 * `completed` and `failed` are terminal.
 */
export type CompletionEvent =
  | { type: "content_delta"; text: string }
  | { type: "tool_call"; call: ToolCall }
  | { type: "completed" }
  | { type: "failed"; reason: string };

/**
 * Failure kinds surfaced to the caller as a terminal `error` event.
 */
export type TurnFailureKind =
  | "STORAGE_UNAVAILABLE"
  | "MODEL_CALL_FAILED"
  | "CONVERSATION_BUSY"
  | "INTERNAL";

/**
 * Events streamed to the caller of `processMessage`.
 * Exactly one `done` or `error` ends every stream.
 */
export type OutputEvent =
  | { type: "content"; text: string }
  | { type: "done" }
  | { type: "error"; message: string; kind: TurnFailureKind };

/**
 * Turn engine states.
 */
export type TurnState =
  | "BUILD_CONTEXT"
  | "AWAIT_MODEL"
  | "DISPATCH_TOOLS"
  | "EMIT_FINAL"
  | "DONE"
  | "FAILED";

export interface TurnTransition {
  turnId: string;
  conversationId: string;
  from: TurnState | null;
  to: TurnState;
  timestamp: string; // ISO 8601
}

export type TurnOutcome = "completed" | "budget_exhausted" | "cancelled" | "failed";

export interface TurnSummary {
  turnId: string;
  conversationId: string;
  outcome: TurnOutcome;
  modelCalls: number;
  toolIterations: number;
  durationMs: number;
}
