/**
 * JSON Schema describing a tool's arguments. Always an object schema.
 */
export interface ToolParametersSchema {
  type: "object";
  properties?: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean | Record<string, unknown>;
  [keyword: string]: unknown;
}

/**
 * Tool description advertised to the model.
 * Immutable once registered.
 */
export interface ToolSpec {
  /** Unique per agent; `^[a-zA-Z0-9_-]{1,64}$` */
  name: string;
  description: string;
  parameters: ToolParametersSchema;
}

/**
 * Context passed to a tool handler for one invocation.
 */
export interface ToolContext {
  toolCallId: string;
  conversationId?: string;
  /** Aborted when the invocation times out */
  signal: AbortSignal;
}

/**
 * Tool implementation. Receives arguments already validated against the
 * spec's `parameters` (defaults applied).
 */
export type ToolHandler = (
  args: Record<string, unknown>,
  context: ToolContext,
) => unknown;

/**
 * A tool as shipped by an agent: its spec plus its handler.
 */
export interface AgentTool {
  spec: ToolSpec;
  handler: ToolHandler;
}
