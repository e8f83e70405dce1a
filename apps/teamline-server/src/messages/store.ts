import type { ChatType, DirectMessage, MessageType, ProjectMessage } from "@teamline/protocol";
import type { Db } from "../db/database.js";
import { encodeReadBy, normalizeReadBy } from "./read-by.js";

interface ProjectRow {
  id: string;
  project_id: string;
  user_id: string;
  body: string | null;
  attachments: string;
  message_type: MessageType;
  reply_to_id: string | null;
  read_by: string | null;
  created_at: number;
  edited_at: number | null;
  deleted_at: number | null;
}

interface DirectRow {
  id: string;
  conversation_id: string;
  organization_id: string;
  sender_id: string;
  receiver_id: string;
  body: string | null;
  attachments: string;
  message_type: MessageType;
  created_at: number;
  edited_at: number | null;
  deleted_at: number | null;
  read_at: number | null;
}

export interface NewProjectMessage {
  id: string;
  projectId: string;
  userId: string;
  body: string | null;
  attachments: string[];
  replyToId: string | null;
  createdAt: number;
}

export interface NewDirectMessage {
  id: string;
  conversationId: string;
  organizationId: string;
  senderId: string;
  receiverId: string;
  body: string | null;
  attachments: string[];
  createdAt: number;
}

export interface HistoryQuery {
  limit: number;
  /** Only messages created strictly before this timestamp */
  before?: number;
}

const TABLES: Record<ChatType, string> = {
  project: "chat_messages",
  direct: "direct_messages",
};

/** Persisted chat messages. Deleted messages are returned as content-free tombstones. */
export class MessageStore {
  constructor(private readonly db: Db) {}

  insertProjectMessage(msg: NewProjectMessage): ProjectMessage {
    this.db
      .prepare(
        `INSERT INTO chat_messages (id, project_id, user_id, body, attachments, message_type, reply_to_id, read_by, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, '[]', ?)`
      )
      .run(
        msg.id,
        msg.projectId,
        msg.userId,
        msg.body,
        JSON.stringify(msg.attachments),
        messageTypeFor(msg.attachments),
        msg.replyToId,
        msg.createdAt
      );
    return this.requireProjectMessage(msg.id);
  }

  insertDirectMessage(msg: NewDirectMessage): DirectMessage {
    this.db
      .prepare(
        `INSERT INTO direct_messages (id, conversation_id, organization_id, sender_id, receiver_id, body, attachments, message_type, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        msg.id,
        msg.conversationId,
        msg.organizationId,
        msg.senderId,
        msg.receiverId,
        msg.body,
        JSON.stringify(msg.attachments),
        messageTypeFor(msg.attachments),
        msg.createdAt
      );
    return this.requireDirectMessage(msg.id);
  }

  findProjectMessage(id: string): ProjectMessage | undefined {
    const row = this.db.prepare<[string], ProjectRow>("SELECT * FROM chat_messages WHERE id = ?").get(id);
    return row ? rowToProjectMessage(row) : undefined;
  }

  findDirectMessage(id: string): DirectMessage | undefined {
    const row = this.db.prepare<[string], DirectRow>("SELECT * FROM direct_messages WHERE id = ?").get(id);
    return row ? rowToDirectMessage(row) : undefined;
  }

  listProjectMessages(projectId: string, query: HistoryQuery): ProjectMessage[] {
    const rows =
      query.before !== undefined
        ? this.db
            .prepare<[string, number, number], ProjectRow>(
              "SELECT * FROM chat_messages WHERE project_id = ? AND created_at < ? ORDER BY created_at DESC, id DESC LIMIT ?"
            )
            .all(projectId, query.before, query.limit)
        : this.db
            .prepare<[string, number], ProjectRow>(
              "SELECT * FROM chat_messages WHERE project_id = ? ORDER BY created_at DESC, id DESC LIMIT ?"
            )
            .all(projectId, query.limit);

    return rows.map(rowToProjectMessage).reverse();
  }

  listDirectMessages(conversationId: string, query: HistoryQuery): DirectMessage[] {
    const rows =
      query.before !== undefined
        ? this.db
            .prepare<[string, number, number], DirectRow>(
              "SELECT * FROM direct_messages WHERE conversation_id = ? AND created_at < ? ORDER BY created_at DESC, id DESC LIMIT ?"
            )
            .all(conversationId, query.before, query.limit)
        : this.db
            .prepare<[string, number], DirectRow>(
              "SELECT * FROM direct_messages WHERE conversation_id = ? ORDER BY created_at DESC, id DESC LIMIT ?"
            )
            .all(conversationId, query.limit);

    return rows.map(rowToDirectMessage).reverse();
  }

  updateBody(chatType: ChatType, id: string, body: string, editedAt: number): void {
    this.db
      .prepare(`UPDATE ${TABLES[chatType]} SET body = ?, edited_at = ? WHERE id = ? AND deleted_at IS NULL`)
      .run(body, editedAt, id);
  }

  /** Returns false when the message was already deleted */
  softDelete(chatType: ChatType, id: string, deletedAt: number): boolean {
    const result = this.db
      .prepare(`UPDATE ${TABLES[chatType]} SET deleted_at = ? WHERE id = ? AND deleted_at IS NULL`)
      .run(deletedAt, id);
    return result.changes > 0;
  }

  /**
   * Add `userId` to the reader set of every undeleted project message at or
   * before `cutoff`. Returns only the ids whose reader set actually changed.
   */
  markProjectRead(projectId: string, userId: string, cutoff: number): string[] {
    const select = this.db.prepare<[string, number], { id: string; read_by: string | null }>(
      `SELECT id, read_by FROM chat_messages
       WHERE project_id = ? AND created_at <= ? AND deleted_at IS NULL
       ORDER BY created_at ASC, id ASC`
    );
    const update = this.db.prepare<[string, string]>("UPDATE chat_messages SET read_by = ? WHERE id = ?");

    const apply = this.db.transaction((): string[] => {
      const changed: string[] = [];
      for (const row of select.all(projectId, cutoff)) {
        const readers = normalizeReadBy(row.read_by);
        if (readers.includes(userId)) continue;
        update.run(encodeReadBy([...readers, userId]), row.id);
        changed.push(row.id);
      }
      return changed;
    });
    return apply();
  }

  /**
   * Stamp `readAt` on the receiver's unread, undeleted messages in the
   * conversation at or before `cutoff`. Returns the ids that were stamped.
   */
  markDirectRead(conversationId: string, receiverId: string, cutoff: number, readAt: number): string[] {
    const filter = `conversation_id = ? AND receiver_id = ? AND created_at <= ? AND read_at IS NULL AND deleted_at IS NULL`;
    const select = this.db.prepare<[string, string, number], { id: string }>(
      `SELECT id FROM direct_messages WHERE ${filter} ORDER BY created_at ASC, id ASC`
    );
    const update = this.db.prepare<[number, string, string, number]>(
      `UPDATE direct_messages SET read_at = ? WHERE ${filter}`
    );

    const apply = this.db.transaction((): string[] => {
      const ids = select.all(conversationId, receiverId, cutoff).map((row) => row.id);
      if (ids.length > 0) update.run(readAt, conversationId, receiverId, cutoff);
      return ids;
    });
    return apply();
  }

  /**
   * Point pre-uploaded attachments at their message. Only rows of the same
   * chat type that are not linked yet are touched.
   */
  linkAttachments(attachmentIds: readonly string[], messageId: string, chatType: ChatType): number {
    if (attachmentIds.length === 0) return 0;
    const placeholders = attachmentIds.map(() => "?").join(",");
    const result = this.db
      .prepare(
        `UPDATE chat_attachments SET message_id = ?
         WHERE id IN (${placeholders}) AND message_type = ? AND message_id IS NULL`
      )
      .run(messageId, ...attachmentIds, chatType);
    return result.changes;
  }

  private requireProjectMessage(id: string): ProjectMessage {
    const message = this.findProjectMessage(id);
    if (!message) throw new Error(`Project message ${id} missing after insert`);
    return message;
  }

  private requireDirectMessage(id: string): DirectMessage {
    const message = this.findDirectMessage(id);
    if (!message) throw new Error(`Direct message ${id} missing after insert`);
    return message;
  }
}

function messageTypeFor(attachments: readonly string[]): MessageType {
  return attachments.length > 0 ? "file" : "text";
}

function parseIdList(raw: string): string[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  return Array.isArray(parsed) ? parsed.filter((id): id is string => typeof id === "string") : [];
}

function rowToProjectMessage(row: ProjectRow): ProjectMessage {
  const deleted = row.deleted_at !== null;
  return {
    chat_type: "project",
    id: row.id,
    project_id: row.project_id,
    user_id: row.user_id,
    body: deleted ? null : row.body,
    attachments: deleted ? [] : parseIdList(row.attachments),
    message_type: row.message_type,
    reply_to_id: row.reply_to_id,
    read_by: normalizeReadBy(row.read_by),
    created_at: row.created_at,
    edited_at: row.edited_at,
    deleted_at: row.deleted_at,
  };
}

function rowToDirectMessage(row: DirectRow): DirectMessage {
  const deleted = row.deleted_at !== null;
  return {
    chat_type: "direct",
    id: row.id,
    conversation_id: row.conversation_id,
    organization_id: row.organization_id,
    sender_id: row.sender_id,
    receiver_id: row.receiver_id,
    body: deleted ? null : row.body,
    attachments: deleted ? [] : parseIdList(row.attachments),
    message_type: row.message_type,
    created_at: row.created_at,
    edited_at: row.edited_at,
    deleted_at: row.deleted_at,
    read_at: row.read_at,
  };
}
