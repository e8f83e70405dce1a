import { scopeTypeOf, type ChatType } from "@teamline/protocol";
import type { ConnectionHub } from "../ws/hub.js";
import { errorMessage } from "../errors.js";
import type { TypingStore } from "./store.js";

export class TypingService {
  constructor(
    private readonly hub: ConnectionHub,
    private readonly store: TypingStore,
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  /** Record the user as typing and tell everyone else in the scope */
  async start(chatType: ChatType, referenceId: string, userId: string): Promise<void> {
    const startedAt = this.now();
    try {
      await this.store.upsert({ chatType, referenceId, userId, startedAt, expiresAt: startedAt + this.ttlMs });
    } catch (err) {
      console.warn(`[typing] Failed to store typing state for ${userId}:`, errorMessage(err));
    }
    await this.announce(chatType, referenceId, userId, true);
  }

  async stop(chatType: ChatType, referenceId: string, userId: string): Promise<void> {
    try {
      await this.store.remove({ chatType, referenceId, userId });
    } catch (err) {
      console.warn(`[typing] Failed to clear typing state for ${userId}:`, errorMessage(err));
    }
    await this.announce(chatType, referenceId, userId, false);
  }

  /** Expiry is advisory here; a row the store has not dropped yet still counts if unexpired */
  async isTyping(chatType: ChatType, referenceId: string, userId: string): Promise<boolean> {
    const row = await this.store.get({ chatType, referenceId, userId });
    return row !== null && row.expiresAt > this.now();
  }

  private async announce(chatType: ChatType, referenceId: string, userId: string, isTyping: boolean): Promise<void> {
    await this.hub.broadcast(
      scopeTypeOf(chatType),
      referenceId,
      { type: "typing", user_id: userId, is_typing: isTyping },
      { excludeUser: userId }
    );
  }
}
