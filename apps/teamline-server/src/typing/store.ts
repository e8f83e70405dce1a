import type { Redis } from "ioredis";
import { z } from "zod";
import type { ChatType } from "@teamline/protocol";

export interface TypingKey {
  chatType: ChatType;
  referenceId: string;
  userId: string;
}

export interface TypingRow extends TypingKey {
  startedAt: number;
  expiresAt: number;
}

/**
 * Ephemeral typing rows. Expiry belongs to the store: rows disappear on their
 * own once `expiresAt` passes, nothing sweeps them.
 */
export interface TypingStore {
  upsert(row: TypingRow): Promise<void>;
  remove(key: TypingKey): Promise<void>;
  get(key: TypingKey): Promise<TypingRow | null>;
  close(): Promise<void>;
}

function typingKey({ chatType, referenceId, userId }: TypingKey): string {
  return `typing:${chatType}:${referenceId}:${userId}`;
}

/** Single-process store; expired rows are dropped when read. */
export class MemoryTypingStore implements TypingStore {
  private rows = new Map<string, TypingRow>();

  constructor(private readonly now: () => number = Date.now) {}

  async upsert(row: TypingRow): Promise<void> {
    this.rows.set(typingKey(row), { ...row });
  }

  async remove(key: TypingKey): Promise<void> {
    this.rows.delete(typingKey(key));
  }

  async get(key: TypingKey): Promise<TypingRow | null> {
    const id = typingKey(key);
    const row = this.rows.get(id);
    if (!row) return null;
    if (row.expiresAt <= this.now()) {
      this.rows.delete(id);
      return null;
    }
    return row;
  }

  async close(): Promise<void> {
    this.rows.clear();
  }
}

const storedRowSchema = z.object({
  started_at: z.number(),
  expires_at: z.number(),
});

/** Rows live under `typing:<chat_type>:<reference>:<user>` with a PX expiry. */
export class RedisTypingStore implements TypingStore {
  constructor(private readonly redis: Redis) {}

  async upsert(row: TypingRow): Promise<void> {
    const ttl = Math.max(1, row.expiresAt - row.startedAt);
    const value = JSON.stringify({ started_at: row.startedAt, expires_at: row.expiresAt });
    await this.redis.set(typingKey(row), value, "PX", ttl);
  }

  async remove(key: TypingKey): Promise<void> {
    await this.redis.del(typingKey(key));
  }

  async get(key: TypingKey): Promise<TypingRow | null> {
    const raw = await this.redis.get(typingKey(key));
    if (raw === null) return null;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      return null;
    }
    const result = storedRowSchema.safeParse(parsed);
    if (!result.success) return null;
    return { ...key, startedAt: result.data.started_at, expiresAt: result.data.expires_at };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
