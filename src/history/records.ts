import { z } from "zod";

export const toolCallSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.record(z.unknown()),
});

export const storedMessageSchema = z.object({
  id: z.string(),
  createdAt: z.string(),
  role: z.enum(["system", "user", "assistant", "tool"]),
  content: z.string().nullable(),
  toolCalls: z.array(toolCallSchema).default([]),
  toolCallId: z.string().optional(),
  name: z.string().optional(),
});

export const toolResultSchema = z.object({
  toolCallId: z.string(),
  toolName: z.string(),
  ok: z.boolean(),
  output: z.unknown().optional(),
  error: z
    .object({
      kind: z.enum(["UNKNOWN_TOOL", "INVALID_ARGUMENTS", "TIMEOUT", "TOOL_EXECUTION_FAILED"]),
      message: z.string(),
      details: z.unknown().optional(),
    })
    .optional(),
  arguments: z.record(z.unknown()),
  durationMs: z.number(),
  createdAt: z.string(),
});
