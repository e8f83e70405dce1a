import type { FastifyInstance } from "fastify";
import { chatTypeOf, type ChatScope } from "@teamline/protocol";
import type { ServerContext } from "../context.js";
import { AuthorizationError } from "../errors.js";
import { requireIdentity, requireOrgMember, requireParticipant, requireProjectMember } from "./auth.js";
import {
  conversationBody,
  editMessageBody,
  historyQuery,
  parseWith,
  readBody,
  sendMessageBody,
  typingBody,
} from "./validate.js";

/** Route params; `messageId` is only present on per-message routes */
type ScopeParams = Record<string, string>;

type ScopeGuard = (ctx: ServerContext, userId: string, id: string) => Promise<void>;

interface ScopeRoutes {
  prefix: string;
  param: "projectId" | "conversationId";
  scopeType: ChatScope["type"];
  guard: ScopeGuard;
}

const SCOPES: ScopeRoutes[] = [
  {
    prefix: "/api/chat/projects/:projectId",
    param: "projectId",
    scopeType: "project",
    guard: requireProjectMember,
  },
  {
    prefix: "/api/chat/direct/conversations/:conversationId",
    param: "conversationId",
    scopeType: "dm",
    guard: requireParticipant,
  },
];

export function registerChatRoutes(app: FastifyInstance, ctx: ServerContext): void {
  for (const routes of SCOPES) {
    registerScopeRoutes(app, ctx, routes);
  }

  app.post("/api/chat/direct/conversations", async (request, reply) => {
    const userId = await requireIdentity(ctx, request);
    const input = parseWith(conversationBody, request.body);

    await requireOrgMember(ctx, userId, input.organization_id);
    if (!(await ctx.membership.isOrgMember(input.user_id, input.organization_id))) {
      throw new AuthorizationError("Both users must belong to the organization");
    }

    const conversation = ctx.conversations.findOrCreate(input.organization_id, userId, input.user_id);
    return reply.code(200).send(conversation);
  });
}

function registerScopeRoutes(app: FastifyInstance, ctx: ServerContext, routes: ScopeRoutes): void {
  const { prefix, param, scopeType, guard } = routes;

  /** Check membership and resolve the scope from the URL */
  const enter = async (request: { params: ScopeParams }, userId: string): Promise<ChatScope> => {
    const id = request.params[param];
    await guard(ctx, userId, id);
    return { type: scopeType, id };
  };

  app.get<{ Params: ScopeParams }>(`${prefix}/messages`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const scope = await enter(request, userId);
    const query = parseWith(historyQuery, request.query);
    return { messages: ctx.chat.listMessages(scope, query) };
  });

  app.post<{ Params: ScopeParams }>(`${prefix}/messages`, async (request, reply) => {
    const userId = await requireIdentity(ctx, request);
    const scope = await enter(request, userId);
    const input = parseWith(sendMessageBody, request.body);
    const message = await ctx.chat.send(scope, userId, input);
    return reply.code(201).send(message);
  });

  app.get<{ Params: ScopeParams }>(`${prefix}/messages/:messageId`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const scope = await enter(request, userId);
    return ctx.chat.getMessage(scope, request.params.messageId);
  });

  app.patch<{ Params: ScopeParams }>(`${prefix}/messages/:messageId`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const scope = await enter(request, userId);
    const { body } = parseWith(editMessageBody, request.body);
    return ctx.chat.edit(scope, userId, request.params.messageId, body);
  });

  app.delete<{ Params: ScopeParams }>(`${prefix}/messages/:messageId`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const scope = await enter(request, userId);
    const deleted = await ctx.chat.delete(scope, userId, request.params.messageId);
    return { success: true, deleted };
  });

  app.post<{ Params: ScopeParams }>(`${prefix}/typing`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const scope = await enter(request, userId);
    const { is_typing } = parseWith(typingBody, request.body);
    if (is_typing) await ctx.typing.start(chatTypeOf(scope.type), scope.id, userId);
    else await ctx.typing.stop(chatTypeOf(scope.type), scope.id, userId);
    return { success: true };
  });

  app.post<{ Params: ScopeParams }>(`${prefix}/read`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const scope = await enter(request, userId);
    const { message_id } = parseWith(readBody, request.body);
    const messageIds = await ctx.chat.markRead(scope, userId, message_id);
    return { success: true, message_ids: messageIds };
  });
}
