import type { RawData } from "ws";
import { v4 as uuid } from "uuid";
import { MESSAGE_FAMILY, type OutboundFrame, type ScopeType, type ServerEvent } from "@teamline/protocol";
import { errorMessage } from "../errors.js";

/** The slice of a `ws` WebSocket the server relies on */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  close(code?: number, reason?: string): void;
  ping(): void;
  terminate(): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "pong", listener: () => void): unknown;
}

/** WebSocket.OPEN */
const SOCKET_OPEN = 1;

export interface HubConnection {
  readonly id: string;
  readonly scopeType: ScopeType;
  readonly scopeId: string;
  readonly userId: string;
  readonly socket: ClientSocket;
  readonly connectedAt: number;
}

export interface BroadcastOptions {
  /** Skip every connection this user holds in the scope */
  excludeUser?: string;
  /** Stamp each recipient's copy with ownership relative to this user */
  senderId?: string;
}

export interface BroadcastResult {
  delivered: number;
  pruned: number;
}

export interface HubStats {
  instance_id: string;
  total_connections: number;
  by_scope: Record<ScopeType, number>;
  unique_users: number;
}

export function normalizeId(id: string): string {
  return id.trim().toLowerCase();
}

function scopeKey(scopeType: ScopeType, scopeId: string): string {
  return `${scopeType}:${normalizeId(scopeId)}`;
}

/**
 * Add the per-recipient ownership stamp. Message-family events use
 * `is_own_message`; everything else uses `is_own`.
 */
export function personalize(event: ServerEvent, recipientId: string, senderId?: string): OutboundFrame {
  if (senderId === undefined) return event;
  const own = normalizeId(senderId) === recipientId;
  return MESSAGE_FAMILY.has(event.type)
    ? { ...event, is_own_message: own, sender_id: senderId }
    : { ...event, is_own: own, sender_id: senderId };
}

/**
 * Registry of live connections grouped by scope and by user. Owned by the
 * server context and handed to every component that delivers frames.
 */
export class ConnectionHub {
  private scopes = new Map<string, Set<HubConnection>>();
  private users = new Map<string, Set<HubConnection>>();

  constructor(readonly instanceId: string) {}

  connect(scopeType: ScopeType, scopeId: string, userId: string, socket: ClientSocket): HubConnection {
    const conn: HubConnection = {
      id: uuid(),
      scopeType,
      scopeId: normalizeId(scopeId),
      userId: normalizeId(userId),
      socket,
      connectedAt: Date.now(),
    };

    addTo(this.scopes, scopeKey(scopeType, conn.scopeId), conn);
    addTo(this.users, conn.userId, conn);
    return conn;
  }

  /** Returns false when the connection was already gone */
  disconnect(conn: HubConnection): boolean {
    const key = scopeKey(conn.scopeType, conn.scopeId);
    const removed = removeFrom(this.scopes, key, conn);
    removeFrom(this.users, conn.userId, conn);
    return removed;
  }

  /**
   * Deliver an event to every live connection in a scope. Sends are issued
   * synchronously in call order so each socket sees broadcasts in the order
   * they were made, and the result never waits for a socket to flush.
   * `delivered` counts frames handed to open sockets. Failed sockets are
   * pruned; the promise never rejects.
   */
  async broadcast(
    scopeType: ScopeType,
    scopeId: string,
    event: ServerEvent,
    options: BroadcastOptions = {}
  ): Promise<BroadcastResult> {
    const targets = this.connectionsIn(scopeType, scopeId);
    const exclude = options.excludeUser !== undefined ? normalizeId(options.excludeUser) : undefined;
    return this.deliverAll(
      targets.filter((c) => c.userId !== exclude),
      event,
      options.senderId
    );
  }

  /** Resolves false when the connection was pruned instead */
  async send(conn: HubConnection, event: ServerEvent): Promise<boolean> {
    return this.deliver(conn, JSON.stringify(event));
  }

  /** Every connection the user holds, whatever the scope */
  sendToUser(userId: string, event: ServerEvent): Promise<BroadcastResult> {
    return this.deliverAll(this.connectionsOf(userId), event);
  }

  connectionsIn(scopeType: ScopeType, scopeId: string): HubConnection[] {
    return Array.from(this.scopes.get(scopeKey(scopeType, scopeId)) ?? []);
  }

  connectionsOf(userId: string): HubConnection[] {
    return Array.from(this.users.get(normalizeId(userId)) ?? []);
  }

  stats(): HubStats {
    const byScope: Record<ScopeType, number> = { project: 0, dm: 0, inbox: 0 };
    let total = 0;
    for (const set of this.scopes.values()) {
      for (const conn of set) {
        byScope[conn.scopeType]++;
        total++;
      }
    }
    return {
      instance_id: this.instanceId,
      total_connections: total,
      by_scope: byScope,
      unique_users: this.users.size,
    };
  }

  /** Close every socket and forget all connections (shutdown) */
  closeAll(code: number, reason: string): void {
    for (const set of this.scopes.values()) {
      for (const conn of set) {
        try {
          conn.socket.close(code, reason);
        } catch (err) {
          console.warn(`[hub] Failed to close connection ${conn.id}:`, errorMessage(err));
        }
      }
    }
    this.scopes.clear();
    this.users.clear();
  }

  private async deliverAll(
    targets: HubConnection[],
    event: ServerEvent,
    senderId?: string
  ): Promise<BroadcastResult> {
    let delivered = 0;
    for (const conn of targets) {
      if (this.deliver(conn, JSON.stringify(personalize(event, conn.userId, senderId)))) delivered++;
    }
    return { delivered, pruned: targets.length - delivered };
  }

  /**
   * Hand the frame to the socket without waiting for it to flush. A write
   * error reported later still prunes the connection.
   */
  private deliver(conn: HubConnection, frame: string): boolean {
    if (conn.socket.readyState !== SOCKET_OPEN) {
      console.warn(`[hub] Pruning closed connection ${conn.id} (${conn.scopeType}:${conn.scopeId})`);
      this.disconnect(conn);
      return false;
    }

    let failed = false;
    const fail = (err: unknown): void => {
      failed = true;
      if (this.disconnect(conn)) {
        console.warn(`[hub] Send to ${conn.id} failed, pruning:`, errorMessage(err));
      }
    };

    try {
      conn.socket.send(frame, (err) => {
        if (err) fail(err);
      });
    } catch (err) {
      fail(err);
    }
    return !failed;
  }
}

function addTo<K>(index: Map<K, Set<HubConnection>>, key: K, conn: HubConnection): void {
  let set = index.get(key);
  if (!set) {
    set = new Set();
    index.set(key, set);
  }
  set.add(conn);
}

function removeFrom<K>(index: Map<K, Set<HubConnection>>, key: K, conn: HubConnection): boolean {
  const set = index.get(key);
  if (!set?.delete(conn)) return false;
  if (set.size === 0) index.delete(key);
  return true;
}
