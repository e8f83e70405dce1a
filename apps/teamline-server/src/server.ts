import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import websocket from "@fastify/websocket";
import type { ScopeType } from "@teamline/protocol";
import type { ServerContext } from "./context.js";
import { ChatError } from "./errors.js";
import { handleConnection } from "./ws/handler.js";
import { registerChatRoutes } from "./http/chat-routes.js";
import { registerInboxRoutes } from "./http/inbox-routes.js";

const SOCKET_ROUTES: { path: string; scopeType: ScopeType; param: string }[] = [
  { path: "/ws/project/:projectId", scopeType: "project", param: "projectId" },
  { path: "/ws/dm/:conversationId", scopeType: "dm", param: "conversationId" },
  { path: "/ws/inbox/:orgId", scopeType: "inbox", param: "orgId" },
];

export async function buildServer(ctx: ServerContext): Promise<FastifyInstance> {
  const app = Fastify({ logger: false });
  await app.register(cors, { origin: ctx.config.corsOrigins });
  await app.register(websocket);

  app.setErrorHandler<FastifyError>((err, request, reply) => {
    if (err instanceof ChatError) {
      return reply.code(err.statusCode).send({ error: err.message, code: err.code });
    }

    const status = err.statusCode ?? 500;
    if (status < 500) {
      return reply.code(status).send({ error: err.message, code: err.code ?? "BAD_REQUEST" });
    }

    console.error(`[server] ${request.method} ${request.url} failed:`, err);
    return reply.code(500).send({ error: "Internal server error", code: "INTERNAL_ERROR" });
  });

  // WebSocket endpoints; the token travels in the query string
  for (const route of SOCKET_ROUTES) {
    app.get<{ Params: Record<string, string>; Querystring: { token?: string } }>(
      route.path,
      { websocket: true },
      (socket, request) => {
        handleConnection(
          socket,
          { scopeType: route.scopeType, resourceId: request.params[route.param], token: request.query.token },
          ctx
        );
      }
    );
  }

  registerChatRoutes(app, ctx);
  registerInboxRoutes(app, ctx);

  // Health check
  app.get("/health", async () => ({ status: "ok", connections: ctx.hub.stats() }));

  return app;
}
