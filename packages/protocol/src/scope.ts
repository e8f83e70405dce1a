/** Broadcast grouping unit for live connections */
export type ScopeType = "project" | "dm" | "inbox";

/** Scopes that carry chat traffic (inbox is server → client only) */
export type ChatScopeType = Exclude<ScopeType, "inbox">;

export interface ChatScope {
  type: ChatScopeType;
  id: string;
}

/** Persisted chat type names, used by message rows and typing keys */
export type ChatType = "project" | "direct";

export function chatTypeOf(scope: ChatScopeType): ChatType {
  return scope === "project" ? "project" : "direct";
}

export function scopeTypeOf(chatType: ChatType): ChatScopeType {
  return chatType === "project" ? "project" : "dm";
}

/** Inbox connections are keyed per (organization, user) pair */
export function inboxScopeId(orgId: string, userId: string): string {
  return `${orgId}:${userId}`;
}
