import type { FastifyRequest } from "fastify";
import type { ServerContext } from "../context.js";
import { AuthenticationError, AuthorizationError } from "../errors.js";

/** Resolve the caller from `Authorization: Bearer <token>` */
export async function requireIdentity(ctx: ServerContext, request: Pick<FastifyRequest, "headers">): Promise<string> {
  const header = request.headers.authorization;
  const match = header ? /^Bearer\s+(.+)$/i.exec(header.trim()) : null;
  const token = match?.[1];
  if (!token) throw new AuthenticationError("Token required");

  const identity = await ctx.identity.verify(token);
  if (!identity) throw new AuthenticationError();
  return identity.id;
}

export async function requireProjectMember(ctx: ServerContext, userId: string, projectId: string): Promise<void> {
  if (!(await ctx.membership.isProjectMember(userId, projectId))) throw new AuthorizationError();
}

export async function requireParticipant(ctx: ServerContext, userId: string, conversationId: string): Promise<void> {
  if (!(await ctx.membership.isConversationParticipant(userId, conversationId))) throw new AuthorizationError();
}

export async function requireOrgMember(ctx: ServerContext, userId: string, orgId: string): Promise<void> {
  if (!(await ctx.membership.isOrgMember(userId, orgId))) throw new AuthorizationError();
}
