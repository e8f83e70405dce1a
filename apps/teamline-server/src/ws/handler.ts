import type { RawData } from "ws";
import {
  CLOSE_ACCESS_DENIED,
  CLOSE_AUTHENTICATION_FAILED,
  chatTypeOf,
  decodeCommand,
  inboxScopeId,
  type ChatScope,
  type ClientCommand,
  type ScopeType,
  type ServerEvent,
} from "@teamline/protocol";
import type { ServerContext } from "../context.js";
import type { MembershipDirectory } from "../auth/membership.js";
import { ChatError, ProtocolError, errorMessage } from "../errors.js";
import type { ClientSocket, HubConnection } from "./hub.js";
import { RateLimiter } from "./rate-limit.js";

export interface Handshake {
  scopeType: ScopeType;
  /** Project id, conversation id or organization id, as it appeared in the URL */
  resourceId: string;
  token: string | undefined;
}

export interface ConnectionHandle {
  /** Resolves true once the connection is registered, false if it was rejected */
  ready: Promise<boolean>;
  /** Resolves once every frame received so far has been processed */
  idle(): Promise<void>;
}

type AuthResult =
  | { ok: true; userId: string }
  | { ok: false; code: number; message: string };

interface Session {
  conn: HubConnection;
  /** The id the token verified to; the hub keeps a normalized copy for matching */
  userId: string;
  resourceId: string;
  limiter: RateLimiter;
}

export function handleConnection(socket: ClientSocket, handshake: Handshake, ctx: ServerContext): ConnectionHandle {
  const buffered: string[] = [];
  let session: Session | null = null;
  let closed = false;
  let queue: Promise<void> = Promise.resolve();

  const enqueue = (current: Session, text: string): void => {
    queue = queue
      .then(() => processFrame(current, text, ctx))
      .catch((err: unknown) => {
        console.error("[ws] Frame processing failed:", errorMessage(err));
      });
  };

  // Frames can arrive while the handshake is still being verified
  socket.on("message", (data) => {
    const text = rawToString(data);
    if (session) enqueue(session, text);
    else if (!closed) buffered.push(text);
  });

  socket.on("close", () => {
    closed = true;
    buffered.length = 0;
    if (session) {
      ctx.hub.disconnect(session.conn);
      ctx.heartbeat.untrack(socket);
      console.log(`[ws] ${session.conn.userId} left ${session.conn.scopeType}:${session.conn.scopeId}`);
    }
  });

  const ready = authorize(handshake, ctx).then((result) => {
    if (closed) return false;

    if (!result.ok) {
      reject(socket, result.code, result.message);
      return false;
    }

    const scopeId =
      handshake.scopeType === "inbox" ? inboxScopeId(handshake.resourceId, result.userId) : handshake.resourceId;
    const current: Session = {
      conn: ctx.hub.connect(handshake.scopeType, scopeId, result.userId, socket),
      userId: result.userId,
      resourceId: handshake.resourceId,
      limiter: new RateLimiter(ctx.config.rateLimit),
    };
    session = current;
    ctx.heartbeat.track(socket);
    console.log(`[ws] ${current.conn.userId} joined ${current.conn.scopeType}:${current.conn.scopeId}`);

    for (const text of buffered.splice(0)) {
      enqueue(current, text);
    }
    return true;
  });

  return { ready, idle: () => ready.then(() => queue) };
}

async function authorize(handshake: Handshake, ctx: ServerContext): Promise<AuthResult> {
  if (!handshake.token) {
    return { ok: false, code: CLOSE_AUTHENTICATION_FAILED, message: "Token required" };
  }

  let userId: string | undefined;
  try {
    userId = (await ctx.identity.verify(handshake.token))?.id;
  } catch (err) {
    console.warn("[ws] Identity verification error:", errorMessage(err));
  }
  if (!userId) {
    return { ok: false, code: CLOSE_AUTHENTICATION_FAILED, message: "Invalid token" };
  }

  let allowed: boolean;
  try {
    allowed = await isMember(ctx.membership, handshake.scopeType, handshake.resourceId, userId);
  } catch (err) {
    console.error(`[ws] Membership lookup failed for ${userId}:`, errorMessage(err));
    return { ok: false, code: CLOSE_ACCESS_DENIED, message: "Verification failed" };
  }
  if (!allowed) {
    return { ok: false, code: CLOSE_ACCESS_DENIED, message: "Access denied" };
  }

  return { ok: true, userId };
}

function isMember(
  membership: MembershipDirectory,
  scopeType: ScopeType,
  resourceId: string,
  userId: string
): Promise<boolean> {
  switch (scopeType) {
    case "project":
      return membership.isProjectMember(userId, resourceId);
    case "dm":
      return membership.isConversationParticipant(userId, resourceId);
    case "inbox":
      return membership.isOrgMember(userId, resourceId);
  }
}

/** Tell the client why, then close. The socket was never registered. */
function reject(socket: ClientSocket, code: number, message: string): void {
  const event: ServerEvent = { type: "error", message };
  try {
    socket.send(JSON.stringify(event), (err) => {
      if (err) console.warn("[ws] Failed to send rejection:", err.message);
    });
    socket.close(code, message);
  } catch (err) {
    console.warn("[ws] Failed to reject connection:", errorMessage(err));
  }
}

async function processFrame(session: Session, text: string, ctx: ServerContext): Promise<void> {
  const scopeType = session.conn.scopeType;
  // Inbox connections are push-only
  if (scopeType === "inbox") return;

  if (!session.limiter.check()) {
    await reply(session, ctx, "Too many messages, slow down");
    return;
  }

  try {
    const decoded = decodeCommand(text);
    if (!decoded.ok) throw new ProtocolError(decoded.error);
    await dispatch({ type: scopeType, id: session.resourceId }, session.userId, decoded.command, ctx);
  } catch (err) {
    if (err instanceof ChatError) {
      await reply(session, ctx, err.message);
    } else {
      console.error(`[ws] Frame from ${session.userId} failed:`, err);
      await reply(session, ctx, "Internal server error");
    }
  }
}

async function dispatch(scope: ChatScope, userId: string, command: ClientCommand, ctx: ServerContext): Promise<void> {
  switch (command.type) {
    case "message":
      await ctx.chat.send(scope, userId, {
        body: command.body,
        attachments: command.attachments,
        reply_to_id: command.reply_to_id,
      });
      return;
    case "typing":
      if (command.is_typing) await ctx.typing.start(chatTypeOf(scope.type), scope.id, userId);
      else await ctx.typing.stop(chatTypeOf(scope.type), scope.id, userId);
      return;
    case "read":
      await ctx.chat.markRead(scope, userId, command.message_id);
      return;
  }
}

async function reply(session: Session, ctx: ServerContext, message: string): Promise<void> {
  await ctx.hub.send(session.conn, { type: "error", message });
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
