/**
 * Failure kinds a tool dispatch can produce. None of them aborts a turn.
 */
export type ToolErrorKind =
  | "UNKNOWN_TOOL"
  | "INVALID_ARGUMENTS"
  | "TIMEOUT"
  | "TOOL_EXECUTION_FAILED";

/**
 * Error information in a tool result.
 */
export interface ToolError {
  kind: ToolErrorKind;
  message: string;
  details?: unknown;
}

/**
 * Outcome of one tool dispatch.
 * Always structured, never throws raw exceptions.
 */
export interface ToolResult {
  toolCallId: string;
  toolName: string;
  ok: boolean;
  output?: unknown;
  error?: ToolError;
  arguments: Record<string, unknown>;
  /** Wall-clock time of the dispatch, retries included */
  durationMs: number;
  createdAt: string; // ISO 8601
}

/**
 * Content of the `tool` message the model sees for a result.
 */
export function renderToolResult(result: ToolResult): string {
  if (result.ok) {
    return JSON.stringify(result.output ?? null);
  }
  return JSON.stringify({ ok: false, error: result.error });
}
