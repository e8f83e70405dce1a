import { v4 as uuid } from "uuid";
import type { InboxEventType, InboxItem } from "@teamline/protocol";
import type { Db } from "../db/database.js";

interface InboxRow {
  id: string;
  user_id: string;
  org_id: string;
  user_by: string | null;
  title: string;
  message: string;
  event_type: InboxEventType;
  reference_id: string | null;
  is_read: number;
  is_archived: number;
  created_at: number;
}

export interface NewInboxItem {
  userId: string;
  orgId: string;
  userBy?: string | null;
  title: string;
  message: string;
  eventType: InboxEventType;
  referenceId?: string | null;
}

export interface InboxQuery {
  /** "active" hides archived items, "archived" shows only them */
  view?: "active" | "archived" | "all";
  unreadOnly?: boolean;
  order?: "asc" | "desc";
  limit?: number;
  offset?: number;
}

export interface InboxPage {
  items: InboxItem[];
  total: number;
  limit: number;
  offset: number;
}

export const DEFAULT_INBOX_LIMIT = 50;
export const MAX_INBOX_LIMIT = 100;

/** Inbox rows are always addressed by (id, owner) so users only touch their own items. */
export class InboxStore {
  constructor(
    private readonly db: Db,
    private readonly now: () => number = Date.now
  ) {}

  create(input: NewInboxItem): InboxItem {
    const item: InboxItem = {
      id: uuid(),
      user_id: input.userId,
      org_id: input.orgId,
      user_by: input.userBy ?? null,
      title: input.title,
      message: input.message,
      event_type: input.eventType,
      reference_id: input.referenceId ?? null,
      is_read: false,
      is_archived: false,
      created_at: this.now(),
    };

    this.db
      .prepare(
        `INSERT INTO inbox (id, user_id, org_id, user_by, title, message, event_type, reference_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        item.id,
        item.user_id,
        item.org_id,
        item.user_by,
        item.title,
        item.message,
        item.event_type,
        item.reference_id,
        item.created_at
      );
    return item;
  }

  get(id: string, userId: string): InboxItem | undefined {
    const row = this.db
      .prepare<[string, string], InboxRow>("SELECT * FROM inbox WHERE id = ? AND user_id = ?")
      .get(id, userId);
    return row ? rowToItem(row) : undefined;
  }

  list(userId: string, orgId: string, query: InboxQuery = {}): InboxPage {
    const limit = Math.min(Math.max(query.limit ?? DEFAULT_INBOX_LIMIT, 1), MAX_INBOX_LIMIT);
    const offset = Math.max(query.offset ?? 0, 0);

    let where = "user_id = ? AND org_id = ?";
    const view = query.view ?? "active";
    if (view === "active") where += " AND is_archived = 0";
    if (view === "archived") where += " AND is_archived = 1";
    if (query.unreadOnly) where += " AND is_read = 0";
    const direction = query.order === "asc" ? "ASC" : "DESC";

    const total = this.db
      .prepare<[string, string], { total: number }>(`SELECT COUNT(*) AS total FROM inbox WHERE ${where}`)
      .get(userId, orgId);
    const rows = this.db
      .prepare<[string, string, number, number], InboxRow>(
        `SELECT * FROM inbox WHERE ${where} ORDER BY created_at ${direction}, id ${direction} LIMIT ? OFFSET ?`
      )
      .all(userId, orgId, limit, offset);

    return { items: rows.map(rowToItem), total: total?.total ?? 0, limit, offset };
  }

  unreadCount(userId: string, orgId: string): number {
    const row = this.db
      .prepare<[string, string], { count: number }>(
        "SELECT COUNT(*) AS count FROM inbox WHERE user_id = ? AND org_id = ? AND is_read = 0 AND is_archived = 0"
      )
      .get(userId, orgId);
    return row?.count ?? 0;
  }

  /** Returns false when the item does not exist for this user */
  markRead(id: string, userId: string): boolean {
    return (
      this.db
        .prepare("UPDATE inbox SET is_read = 1, read_at = COALESCE(read_at, ?) WHERE id = ? AND user_id = ?")
        .run(this.now(), id, userId).changes > 0
    );
  }

  setArchived(id: string, userId: string, archived: boolean): boolean {
    return (
      this.db
        .prepare("UPDATE inbox SET is_archived = ?, archived_at = ? WHERE id = ? AND user_id = ?")
        .run(archived ? 1 : 0, archived ? this.now() : null, id, userId).changes > 0
    );
  }

  remove(id: string, userId: string): boolean {
    return this.db.prepare("DELETE FROM inbox WHERE id = ? AND user_id = ?").run(id, userId).changes > 0;
  }
}

function rowToItem(row: InboxRow): InboxItem {
  return {
    id: row.id,
    user_id: row.user_id,
    org_id: row.org_id,
    user_by: row.user_by,
    title: row.title,
    message: row.message,
    event_type: row.event_type,
    reference_id: row.reference_id,
    is_read: row.is_read === 1,
    is_archived: row.is_archived === 1,
    created_at: row.created_at,
  };
}
