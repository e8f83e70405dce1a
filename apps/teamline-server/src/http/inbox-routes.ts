import type { FastifyInstance } from "fastify";
import type { ServerContext } from "../context.js";
import { requireIdentity, requireOrgMember } from "./auth.js";
import { inboxQuery, parseWith } from "./validate.js";

interface InboxParams {
  orgId: string;
  inboxId: string;
}

export function registerInboxRoutes(app: FastifyInstance, ctx: ServerContext): void {
  const base = "/api/orgs/:orgId/inbox";

  app.get<{ Params: Pick<InboxParams, "orgId"> }>(base, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const { orgId } = request.params;
    await requireOrgMember(ctx, userId, orgId);

    const query = parseWith(inboxQuery, request.query);
    return ctx.inbox.list(userId, orgId, {
      view: query.view,
      unreadOnly: query.unread_only,
      order: query.order,
      limit: query.limit,
      offset: query.offset,
    });
  });

  app.get<{ Params: Pick<InboxParams, "orgId"> }>(`${base}/unread-count`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const { orgId } = request.params;
    await requireOrgMember(ctx, userId, orgId);
    return { count: ctx.inbox.unreadCount(userId, orgId) };
  });

  app.patch<{ Params: InboxParams }>(`${base}/:inboxId/read`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const { orgId, inboxId } = request.params;
    await requireOrgMember(ctx, userId, orgId);
    return ctx.notifications.markRead(userId, orgId, inboxId);
  });

  app.patch<{ Params: InboxParams }>(`${base}/:inboxId/archive`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const { orgId, inboxId } = request.params;
    await requireOrgMember(ctx, userId, orgId);
    return ctx.notifications.archive(userId, orgId, inboxId);
  });

  app.patch<{ Params: InboxParams }>(`${base}/:inboxId/unarchive`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const { orgId, inboxId } = request.params;
    await requireOrgMember(ctx, userId, orgId);
    return ctx.notifications.unarchive(userId, orgId, inboxId);
  });

  app.delete<{ Params: InboxParams }>(`${base}/:inboxId`, async (request) => {
    const userId = await requireIdentity(ctx, request);
    const { orgId, inboxId } = request.params;
    await requireOrgMember(ctx, userId, orgId);
    await ctx.notifications.remove(userId, orgId, inboxId);
    return { success: true };
  });
}
