export type { Role, ToolCall, Message, StoredMessage } from "./Message.js";
export {
  systemMessage,
  userMessage,
  assistantMessage,
  toolMessage,
} from "./Message.js";
export type {
  ToolParametersSchema,
  ToolSpec,
  ToolContext,
  ToolHandler,
  AgentTool,
} from "./ToolSpec.js";
export type { ToolErrorKind, ToolError, ToolResult } from "./ToolResult.js";
export { renderToolResult } from "./ToolResult.js";
export type {
  CompletionEvent,
  TurnFailureKind,
  OutputEvent,
  TurnState,
  TurnTransition,
  TurnOutcome,
  TurnSummary,
} from "./Events.js";
