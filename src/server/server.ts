import { once } from "node:events";
import type { Writable } from "node:stream";
import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import { z } from "zod";
import type { AgentService } from "../agent/AgentService.js";
import { collectReply } from "../agent/Agent.js";
import { TurnFailedError, UnknownAgentKindError, errorMessage } from "../core/errors.js";
import { silentLogger, type Logger } from "../observability/Logger.js";
import type { OutputEvent } from "../types/Events.js";

export interface BuildServerOptions {
  logger?: Logger;
}

const chatBodySchema = z.object({
  message: z.string().min(1),
  chat_id: z.string().min(1),
  user_id: z.string().min(1),
  agent_type: z.string().min(1).optional(),
  persona: z.string().min(1).optional(),
});

export type ChatBody = z.infer<typeof chatBodySchema>;

export const ENDPOINTS = {
  chat: "POST /agents/chat",
  chatNonStreaming: "POST /agents/chat/non-streaming",
  info: "GET /agents/info",
  health: "GET /agents/health",
} as const;

/**
 * SSE payload for one output event.
 */
export function toSsePayload(event: OutputEvent): Record<string, string> {
  switch (event.type) {
    case "content":
      return { type: "content", chunk: event.text };
    case "done":
      return { type: "done" };
    case "error":
      return { type: "error", error: event.message, kind: event.kind };
  }
}

/**
 * Write one SSE frame. When the socket buffer is full this waits for
 * `drain`, so a slow reader holds back the turn; it returns early once
 * `signal` aborts.
 */
export async function writeSseEvent(
  out: Writable,
  payload: Record<string, string>,
  signal: AbortSignal,
): Promise<void> {
  if (out.write(`data: ${JSON.stringify(payload)}\n\n`)) return;
  try {
    await once(out, "drain", { signal });
  } catch (error) {
    if (!signal.aborted) throw error;
  }
}

/**
 * HTTP transport over an AgentService. Routes only translate; every turn
 * goes through the service so conversation ordering holds.
 */
export function buildServer(
  service: AgentService,
  options: BuildServerOptions = {},
): FastifyInstance {
  const logger = options.logger ?? silentLogger;
  const app = Fastify({ logger: false });

  type ParsedChat =
    | { ok: true; body: ChatBody; agentKind: string }
    | { ok: false };

  const parseChat = (raw: unknown, reply: FastifyReply): ParsedChat => {
    const parsed = chatBodySchema.safeParse(raw);
    if (!parsed.success) {
      void reply.code(400).send({
        error: "Invalid request body",
        issues: parsed.error.issues.map(
          (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
        ),
      });
      return { ok: false };
    }
    const agentKind = parsed.data.agent_type ?? service.config.defaultAgentKind;
    if (!service.hasAgentKind(agentKind)) {
      const error = new UnknownAgentKindError(
        agentKind,
        service.info().agentKinds.map((k) => k.kind),
      );
      void reply.code(400).send({ error: error.message, kind: error.kind });
      return { ok: false };
    }
    return { ok: true, body: parsed.data, agentKind };
  };

  app.post("/agents/chat", async (request, reply) => {
    const parsed = parseChat(request.body, reply);
    if (!parsed.ok) return reply;
    const { body, agentKind } = parsed;

    const controller = new AbortController();
    reply.raw.on("close", () => {
      if (!reply.raw.writableEnded) {
        logger.info("http.client_disconnected", { chatId: body.chat_id });
        controller.abort();
      }
    });

    reply.hijack();
    reply.raw.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });

    try {
      const events = service.chat({
        agentKind,
        agentId: body.user_id,
        conversationId: body.chat_id,
        message: body.message,
        persona: body.persona,
        signal: controller.signal,
      });
      for await (const event of events) {
        if (controller.signal.aborted) break;
        await writeSseEvent(reply.raw, toSsePayload(event), controller.signal);
      }
    } catch (error) {
      logger.error("http.chat_failed", { chatId: body.chat_id, error: errorMessage(error) });
      if (!controller.signal.aborted) {
        reply.raw.write(
          `data: ${JSON.stringify({ type: "error", error: errorMessage(error), kind: "INTERNAL" })}\n\n`,
        );
      }
    } finally {
      reply.raw.end();
    }
    return reply;
  });

  app.post("/agents/chat/non-streaming", async (request, reply) => {
    const parsed = parseChat(request.body, reply);
    if (!parsed.ok) return reply;
    const { body, agentKind } = parsed;

    try {
      const content = await collectReply(
        service.chat({
          agentKind,
          agentId: body.user_id,
          conversationId: body.chat_id,
          message: body.message,
          persona: body.persona,
        }),
      );
      return {
        content,
        chat_id: body.chat_id,
        user_id: body.user_id,
        agent_type: agentKind,
        timestamp: new Date().toISOString(),
      };
    } catch (error) {
      if (error instanceof TurnFailedError) {
        const status = error.kind === "CONVERSATION_BUSY" ? 429 : 502;
        return reply.code(status).send({ error: error.message, kind: error.kind });
      }
      throw error;
    }
  });

  app.get("/agents/info", async () => {
    const info = service.info();
    return {
      agent_types: info.agentKinds,
      default_agent_type: info.defaultAgentKind,
      storage: info.storage,
      cached_agents: info.cachedAgents,
      active_conversations: info.activeConversations,
      endpoints: Object.values(ENDPOINTS),
      metrics: info.metrics,
    };
  });

  app.get("/agents/health", async (_request, reply) => {
    const storage = await service.healthCheck();
    const healthy = storage.status === "healthy";
    return reply.code(healthy ? 200 : 503).send({
      status: healthy ? "healthy" : "unhealthy",
      storage,
      timestamp: new Date().toISOString(),
    });
  });

  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  app.setErrorHandler((error, _request, reply) => {
    logger.error("http.unhandled", { error: error.message });
    void reply.code(error.statusCode ?? 500).send({ error: error.message, kind: "INTERNAL" });
  });

  return app;
}

export interface StartServerOptions extends BuildServerOptions {
  host: string;
  port: number;
}

/**
 * Listen until SIGINT/SIGTERM, then close the server and the service.
 */
export async function startServer(
  service: AgentService,
  options: StartServerOptions,
): Promise<FastifyInstance> {
  const logger = options.logger ?? silentLogger;
  const app = buildServer(service, options);
  const address = await app.listen({ host: options.host, port: options.port });
  logger.info("server.listening", { address });

  const shutdown = (signal: string) => {
    logger.info("server.shutdown", { signal });
    app
      .close()
      .then(() => service.shutdown())
      .then(
        () => process.exit(0),
        (error: unknown) => {
          logger.error("server.shutdown_failed", { error: errorMessage(error) });
          process.exit(1);
        },
      );
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  return app;
}
