import { v4 as uuid } from "uuid";
import {
  MAX_ATTACHMENTS,
  MAX_BODY_LENGTH,
  authorOf,
  chatTypeOf,
  type ChatMessage,
  type ChatScope,
  type DirectMessage,
  type MessageInput,
  type ProjectMessage,
} from "@teamline/protocol";
import type { ConnectionHub } from "../ws/hub.js";
import type { MembershipDirectory } from "../auth/membership.js";
import type { ConversationStore } from "../chat/conversations.js";
import type { ProfileDirectory } from "../users/profiles.js";
import type { NotificationService } from "../notifications/service.js";
import { ForbiddenError, NotFoundError, ValidationError, errorMessage } from "../errors.js";
import type { MessageStore } from "./store.js";

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

export interface ChatServiceOptions {
  editWindowMs: number;
  now?: () => number;
}

export interface ListOptions {
  limit?: number;
  before?: number;
}

/**
 * Send, edit, delete and read-tracking for project and direct chats. Every
 * state change is persisted first and then broadcast into the scope; callers
 * are expected to have checked scope membership already.
 */
export class ChatService {
  private readonly editWindowMs: number;
  private readonly now: () => number;

  constructor(
    private readonly store: MessageStore,
    private readonly conversations: ConversationStore,
    private readonly membership: MembershipDirectory,
    private readonly profiles: ProfileDirectory,
    private readonly hub: ConnectionHub,
    private readonly notifications: NotificationService | null,
    options: ChatServiceOptions
  ) {
    this.editWindowMs = options.editWindowMs;
    this.now = options.now ?? Date.now;
  }

  async send(scope: ChatScope, senderId: string, input: MessageInput): Promise<ChatMessage> {
    const body = input.body?.trim() ? input.body : null;
    const attachments = input.attachments ?? [];

    if (body === null && attachments.length === 0) {
      throw new ValidationError("Message must have a body or at least one attachment");
    }
    if (body !== null && body.length > MAX_BODY_LENGTH) {
      throw new ValidationError(`Message body exceeds ${MAX_BODY_LENGTH} characters`);
    }
    if (attachments.length > MAX_ATTACHMENTS) {
      throw new ValidationError(`A message can carry at most ${MAX_ATTACHMENTS} attachments`);
    }

    const message = scope.type === "project"
      ? this.createProjectMessage(scope.id, senderId, body, attachments, input.reply_to_id ?? null)
      : this.createDirectMessage(scope.id, senderId, body, attachments);

    try {
      this.store.linkAttachments(attachments, message.id, message.chat_type);
    } catch (err) {
      console.warn(`[chat] Failed to link attachments to ${message.id}:`, errorMessage(err));
    }

    const enriched = this.enrich(message);
    await this.hub.broadcast(scope.type, scope.id, { type: "message", data: enriched }, { senderId });

    if (enriched.chat_type === "direct") {
      await this.notifyReceiver(enriched);
    }
    return enriched;
  }

  async edit(scope: ChatScope, userId: string, messageId: string, body: string): Promise<ChatMessage> {
    const message = this.find(scope, messageId);

    if (authorOf(message) !== userId) {
      throw new ForbiddenError("You can only edit your own messages");
    }
    if (message.deleted_at !== null) {
      throw new ForbiddenError("Cannot edit a deleted message");
    }
    if (this.now() - message.created_at > this.editWindowMs) {
      throw new ForbiddenError("Edit window has expired");
    }
    if (!body.trim() && message.attachments.length === 0) {
      throw new ValidationError("Message must have a body or at least one attachment");
    }
    if (body.length > MAX_BODY_LENGTH) {
      throw new ValidationError(`Message body exceeds ${MAX_BODY_LENGTH} characters`);
    }

    this.store.updateBody(message.chat_type, message.id, body, this.now());
    const updated = this.enrich(this.find(scope, messageId));
    await this.hub.broadcast(scope.type, scope.id, { type: "message_edited", data: updated }, { senderId: userId });
    return updated;
  }

  /** Soft delete. Returns false when the message was already deleted. */
  async delete(scope: ChatScope, userId: string, messageId: string): Promise<boolean> {
    const message = this.find(scope, messageId);

    if (authorOf(message) !== userId) {
      const isAdmin = message.chat_type === "project"
        && (await this.membership.isProjectAdmin(userId, message.project_id));
      if (!isAdmin) {
        throw new ForbiddenError("You can only delete your own messages");
      }
    }

    if (!this.store.softDelete(message.chat_type, message.id, this.now())) {
      return false;
    }

    await this.hub.broadcast(
      scope.type,
      scope.id,
      { type: "message_deleted", message_id: message.id },
      { senderId: userId }
    );
    return true;
  }

  /**
   * Mark everything up to and including the cursor message as read by
   * `userId`. Returns the ids whose read state changed; a read event is only
   * broadcast when that list is non-empty.
   */
  async markRead(scope: ChatScope, userId: string, cursorId: string): Promise<string[]> {
    const cursor = this.find(scope, cursorId);

    const changed = scope.type === "project"
      ? this.store.markProjectRead(scope.id, userId, cursor.created_at)
      : this.store.markDirectRead(scope.id, userId, cursor.created_at, this.now());

    if (changed.length > 0) {
      await this.hub.broadcast(
        scope.type,
        scope.id,
        { type: "read", user_id: userId, message_id: cursorId, message_ids: changed },
        { senderId: userId }
      );
    }
    return changed;
  }

  getMessage(scope: ChatScope, messageId: string): ChatMessage {
    return this.enrich(this.find(scope, messageId));
  }

  /** Newest page first, returned oldest-first */
  listMessages(scope: ChatScope, options: ListOptions = {}): ChatMessage[] {
    const limit = Math.min(Math.max(options.limit ?? DEFAULT_PAGE_SIZE, 1), MAX_PAGE_SIZE);
    const query = { limit, before: options.before };
    const messages: ChatMessage[] = scope.type === "project"
      ? this.store.listProjectMessages(scope.id, query)
      : this.store.listDirectMessages(scope.id, query);
    return messages.map((m) => this.enrich(m));
  }

  private createProjectMessage(
    projectId: string,
    userId: string,
    body: string | null,
    attachments: string[],
    replyToId: string | null
  ): ProjectMessage {
    if (replyToId !== null) {
      const target = this.store.findProjectMessage(replyToId);
      if (!target || target.project_id !== projectId) {
        throw new NotFoundError("Reply target not found");
      }
    }

    return this.store.insertProjectMessage({
      id: uuid(),
      projectId,
      userId,
      body,
      attachments,
      replyToId,
      createdAt: this.now(),
    });
  }

  private createDirectMessage(
    conversationId: string,
    senderId: string,
    body: string | null,
    attachments: string[]
  ): DirectMessage {
    const conversation = this.conversations.require(conversationId);
    return this.store.insertDirectMessage({
      id: uuid(),
      conversationId,
      organizationId: conversation.organization_id,
      senderId,
      receiverId: this.conversations.otherParticipant(conversation, senderId),
      body,
      attachments,
      createdAt: this.now(),
    });
  }

  private find(scope: ChatScope, messageId: string): ChatMessage {
    const message = scope.type === "project"
      ? this.store.findProjectMessage(messageId)
      : this.store.findDirectMessage(messageId);

    const inScope = message !== undefined
      && chatTypeOf(scope.type) === message.chat_type
      && (message.chat_type === "project" ? message.project_id : message.conversation_id) === scope.id;
    if (!message || !inScope) {
      throw new NotFoundError("Message not found");
    }
    return message;
  }

  private enrich(message: ChatMessage): ChatMessage {
    if (message.chat_type === "project") {
      return { ...message, user: this.profiles.get(message.user_id) };
    }
    return {
      ...message,
      sender: this.profiles.get(message.sender_id),
      receiver: this.profiles.get(message.receiver_id),
    };
  }

  private async notifyReceiver(message: DirectMessage): Promise<void> {
    if (!this.notifications) return;
    try {
      await this.notifications.notifyDirectMessage({
        userId: message.receiver_id,
        orgId: message.organization_id,
        senderId: message.sender_id,
        senderName: message.sender?.display_name ?? "Someone",
        preview: message.body ?? "Sent an attachment",
        conversationId: message.conversation_id,
      });
    } catch (err) {
      console.warn(`[chat] Failed to create inbox notification for ${message.id}:`, errorMessage(err));
    }
  }
}
