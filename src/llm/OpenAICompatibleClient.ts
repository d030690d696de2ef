/**
 * Completion client for OpenAI-compatible chat completions APIs.
 * Use createOpenAICompatibleClient(baseUrl, model, apiKey?) and iterate .complete(request).
 */

import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { Message, ToolCall } from "../types/Message.js";
import type { ToolSpec } from "../types/ToolSpec.js";
import type { CompletionEvent } from "../types/Events.js";
import { errorMessage } from "../core/errors.js";
import { isRecord } from "../core/guards.js";
import { silentLogger, type Logger } from "../observability/Logger.js";
import type { CompletionClient, CompletionRequest } from "./CompletionClient.js";

export interface OpenAIToolDefinition {
  type: "function";
  function: {
    name: string;
    description?: string;
    parameters?: object;
  };
}

export interface OpenAIWireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type OpenAIWireMessage =
  | { role: "system" | "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: OpenAIWireToolCall[] }
  | { role: "tool"; content: string; tool_call_id: string };

export interface OpenAICompatibleClientConfig {
  baseUrl: string;
  model: string;
  apiKey?: string;
  temperature?: number;
  /** Request timeout in milliseconds. Default 60000. */
  timeoutMs?: number;
  fetch?: typeof fetch;
  logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 60_000;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  id: z.string().nullish(),
                  function: z.object({
                    name: z.string(),
                    arguments: z.string().nullish(),
                  }),
                }),
              )
              .nullish(),
          })
          .nullish(),
      }),
    )
    .default([]),
});

const chunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number().int().default(0),
                  id: z.string().nullish(),
                  function: z
                    .object({
                      name: z.string().nullish(),
                      arguments: z.string().nullish(),
                    })
                    .nullish(),
                }),
              )
              .nullish(),
          })
          .nullish(),
      }),
    )
    .default([]),
});

type ChunkToolCallDelta = NonNullable<
  NonNullable<z.infer<typeof chunkSchema>["choices"][number]["delta"]>["tool_calls"]
>[number];

interface PartialToolCall {
  id: string;
  name: string;
  arguments: string;
}

/** Thrown inside the client only; always mapped to a `failed` event. */
class CompletionFailure extends Error {}

export function createOpenAICompatibleClient(
  baseUrl: string,
  model: string,
  apiKey?: string,
): OpenAICompatibleClient {
  return new OpenAICompatibleClient({ baseUrl, model, apiKey });
}

export class OpenAICompatibleClient implements CompletionClient {
  private readonly baseUrl: string;
  private readonly model: string;
  private readonly apiKey?: string;
  private readonly temperature?: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(config: OpenAICompatibleClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/$/, "");
    this.model = config.model;
    this.apiKey = config.apiKey;
    this.temperature = config.temperature;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetch ?? fetch;
    this.logger = config.logger ?? silentLogger;
  }

  async *complete(request: CompletionRequest): AsyncGenerator<CompletionEvent> {
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: this.buildHeaders(),
        body: JSON.stringify(this.buildBody(request)),
        signal: controller.signal,
      });

      if (!response.ok) {
        const body = await response.text();
        yield {
          type: "failed",
          reason: `Model API error ${response.status}: ${body.slice(0, 500)}`,
        };
        return;
      }

      if (request.stream && response.body) {
        yield* this.readStream(response.body);
      } else {
        yield* this.readCompletion(await response.json());
      }
    } catch (error) {
      const reason = timedOut
        ? `Model request timed out after ${this.timeoutMs}ms`
        : controller.signal.aborted
          ? "Model request aborted"
          : errorMessage(error);
      this.logger.warn("model.request_failed", { reason });
      yield { type: "failed", reason };
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener("abort", onAbort);
    }
  }

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.apiKey) headers["Authorization"] = `Bearer ${this.apiKey}`;
    return headers;
  }

  private buildBody(request: CompletionRequest): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: request.messages.map(serializeMessage),
    };
    if (request.tools.length > 0) body.tools = request.tools.map(toToolDefinition);
    if (this.temperature !== undefined) body.temperature = this.temperature;
    if (request.stream) body.stream = true;
    return body;
  }

  private *readCompletion(raw: unknown): Generator<CompletionEvent> {
    const parsed = completionSchema.safeParse(raw);
    if (!parsed.success) {
      yield { type: "failed", reason: "Malformed completion payload" };
      return;
    }
    const message = parsed.data.choices[0]?.message;
    if (!message) {
      yield { type: "failed", reason: "Completion has no choices" };
      return;
    }
    if (message.content) yield { type: "content_delta", text: message.content };

    const partials = (message.tool_calls ?? []).map((tc) => ({
      id: tc.id ?? "",
      name: tc.function.name,
      arguments: tc.function.arguments ?? "",
    }));
    yield* finishToolCalls(partials);
  }

  private async *readStream(body: ReadableStream<Uint8Array>): AsyncGenerator<CompletionEvent> {
    const decoder = new TextDecoder();
    const reader = body.getReader();
    const partials = new Map<number, PartialToolCall>();
    let buffer = "";
    let finished = false;

    try {
      while (!finished) {
        const { done, value } = await reader.read();
        // On end of body, flush the decoder and read the last line even without a newline.
        buffer += done ? `${decoder.decode()}\n` : decoder.decode(value, { stream: true });

        let newline = buffer.indexOf("\n");
        while (newline !== -1 && !finished) {
          const line = buffer.slice(0, newline).trim();
          buffer = buffer.slice(newline + 1);
          newline = buffer.indexOf("\n");

          if (!line.startsWith("data:")) continue;
          const data = line.slice(5).trim();
          if (data === "[DONE]") {
            finished = true;
            break;
          }
          const text = applyChunk(parseChunk(data), partials);
          if (text) yield { type: "content_delta", text };
        }
        if (done) break;
      }
    } finally {
      reader.releaseLock();
    }

    if (!finished) {
      yield { type: "failed", reason: "Model stream ended before completion" };
      return;
    }

    const ordered = [...partials.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, partial]) => partial);
    yield* finishToolCalls(ordered);
  }
}

function parseChunk(data: string): z.infer<typeof chunkSchema> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(data);
  } catch {
    throw new CompletionFailure("Malformed stream chunk");
  }
  const parsed = chunkSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new CompletionFailure("Malformed stream chunk");
  }
  return parsed.data;
}

/** Merge one chunk into the tool-call accumulators; returns its content text. */
function applyChunk(
  chunk: z.infer<typeof chunkSchema>,
  partials: Map<number, PartialToolCall>,
): string {
  let text = "";
  for (const choice of chunk.choices) {
    const delta = choice.delta;
    if (!delta) continue;
    if (delta.content) text += delta.content;
    for (const fragment of delta.tool_calls ?? []) {
      mergeToolCallFragment(partials, fragment);
    }
  }
  return text;
}

function mergeToolCallFragment(
  partials: Map<number, PartialToolCall>,
  fragment: ChunkToolCallDelta,
): void {
  const existing = partials.get(fragment.index) ?? { id: "", name: "", arguments: "" };
  if (fragment.id) existing.id = fragment.id;
  if (fragment.function?.name) existing.name += fragment.function.name;
  if (fragment.function?.arguments) existing.arguments += fragment.function.arguments;
  partials.set(fragment.index, existing);
}

function* finishToolCalls(partials: PartialToolCall[]): Generator<CompletionEvent> {
  const calls: ToolCall[] = [];
  for (const partial of partials) {
    if (!partial.name) {
      yield { type: "failed", reason: "Model returned a tool call without a name" };
      return;
    }
    const args = parseArguments(partial.arguments);
    if (!args) {
      yield {
        type: "failed",
        reason: `Model returned malformed arguments for tool ${partial.name}`,
      };
      return;
    }
    calls.push({ id: partial.id || `call_${uuidv4()}`, name: partial.name, arguments: args });
  }
  for (const call of calls) {
    yield { type: "tool_call", call };
  }
  yield { type: "completed" };
}

function parseArguments(json: string): Record<string, unknown> | undefined {
  if (!json.trim()) return {};
  try {
    const value: unknown = JSON.parse(json);
    return isRecord(value) ? value : undefined;
  } catch {
    return undefined;
  }
}

export function serializeMessage(m: Message): OpenAIWireMessage {
  switch (m.role) {
    case "tool":
      return { role: "tool", content: m.content ?? "", tool_call_id: m.toolCallId ?? "" };
    case "assistant":
      return m.toolCalls.length > 0
        ? {
            role: "assistant",
            content: m.content,
            tool_calls: m.toolCalls.map((call) => ({
              id: call.id,
              type: "function",
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          }
        : { role: "assistant", content: m.content ?? "" };
    default:
      return { role: m.role, content: m.content ?? "" };
  }
}

export function toToolDefinition(spec: ToolSpec): OpenAIToolDefinition {
  return {
    type: "function",
    function: { name: spec.name, description: spec.description, parameters: spec.parameters },
  };
}
