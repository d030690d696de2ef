import type { ToolErrorKind } from "../types/ToolResult.js";
import type { TurnFailureKind } from "../types/Events.js";

export type ErrorKind =
  | ToolErrorKind
  | TurnFailureKind
  | "DUPLICATE_TOOL_NAME"
  | "INVALID_TOOL_SPEC"
  | "UNKNOWN_AGENT_KIND"
  | "CONFIG_INVALID";

/**
 * Base class for every error raised by the runtime.
 * `kind` drives retry classification and transport status codes.
 */
export class AgentRuntimeError extends Error {
  readonly kind: ErrorKind;
  readonly details?: unknown;

  constructor(kind: ErrorKind, message: string, details?: unknown) {
    super(message);
    this.name = "AgentRuntimeError";
    this.kind = kind;
    this.details = details;
  }
}

/**
 * The history backend could not be reached. Aborts the turn.
 */
export class StorageUnavailableError extends AgentRuntimeError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(
      "STORAGE_UNAVAILABLE",
      `Conversation storage unavailable during ${operation}: ${errorMessage(cause)}`,
    );
    this.name = "StorageUnavailableError";
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * A tool with the same name is already registered. Fatal at agent construction.
 */
export class DuplicateToolNameError extends AgentRuntimeError {
  constructor(readonly toolName: string) {
    super("DUPLICATE_TOOL_NAME", `Tool "${toolName}" is already registered`);
    this.name = "DuplicateToolNameError";
  }
}

export class InvalidToolSpecError extends AgentRuntimeError {
  constructor(readonly toolName: string, reason: string) {
    super("INVALID_TOOL_SPEC", `Invalid spec for tool "${toolName}": ${reason}`);
    this.name = "InvalidToolSpecError";
  }
}

/**
 * The model asked for a tool the agent does not have.
 * Never thrown out of dispatch; it becomes a ToolResult error.
 */
export class UnknownToolError extends AgentRuntimeError {
  constructor(readonly toolName: string) {
    super("UNKNOWN_TOOL", `Unknown tool "${toolName}"`);
    this.name = "UnknownToolError";
  }
}

export class ToolTimeoutError extends AgentRuntimeError {
  constructor(readonly toolName: string, readonly timeoutMs: number) {
    super("TIMEOUT", `Tool "${toolName}" timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

/**
 * The completion client reported a failure, or the model call timed out.
 */
export class ModelCallFailedError extends AgentRuntimeError {
  constructor(readonly reason: string) {
    super("MODEL_CALL_FAILED", `Model call failed: ${reason}`);
    this.name = "ModelCallFailedError";
  }
}

export class UnknownAgentKindError extends AgentRuntimeError {
  constructor(readonly agentKind: string, available: string[]) {
    super(
      "UNKNOWN_AGENT_KIND",
      `Unknown agent type "${agentKind}". Available: ${available.join(", ") || "(none)"}`,
    );
    this.name = "UnknownAgentKindError";
  }
}

export class ConfigError extends AgentRuntimeError {
  constructor(message: string, readonly issues: string[] = []) {
    super("CONFIG_INVALID", message, issues);
    this.name = "ConfigError";
  }
}

/**
 * Thrown by non-streaming consumers when a turn ended with an `error` event.
 */
export class TurnFailedError extends AgentRuntimeError {
  constructor(kind: TurnFailureKind, message: string) {
    super(kind, message);
    this.name = "TurnFailedError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (error === undefined) return "unknown error";
  return String(error);
}
