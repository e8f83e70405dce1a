import type { MessageAuthor } from "@teamline/protocol";
import type { Db } from "../db/database.js";

interface ProfileRow {
  id: string;
  display_name: string | null;
  avatar_url: string | null;
}

export interface ProfileInput {
  id: string;
  displayName?: string | null;
  avatarUrl?: string | null;
  email?: string | null;
}

/** Author display info, read through a small per-process cache. */
export class ProfileDirectory {
  private cache = new Map<string, MessageAuthor>();

  constructor(private readonly db: Db) {}

  upsert(profile: ProfileInput): void {
    this.db
      .prepare<[string, string | null, string | null, string | null, number]>(
        `INSERT INTO user_profiles (id, display_name, avatar_url, email, updated_at) VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET display_name = excluded.display_name, avatar_url = excluded.avatar_url,
           email = excluded.email, updated_at = excluded.updated_at`
      )
      .run(profile.id, profile.displayName ?? null, profile.avatarUrl ?? null, profile.email ?? null, Date.now());
    this.cache.delete(profile.id);
  }

  /** Unknown users still get an author stub so payloads keep their shape */
  get(userId: string): MessageAuthor {
    const cached = this.cache.get(userId);
    if (cached) return cached;

    const row = this.db
      .prepare<[string], ProfileRow>("SELECT id, display_name, avatar_url FROM user_profiles WHERE id = ?")
      .get(userId);

    const author: MessageAuthor = row
      ? { id: row.id, display_name: row.display_name, avatar_url: row.avatar_url }
      : { id: userId, display_name: null, avatar_url: null };
    if (row) this.cache.set(userId, author);
    return author;
  }
}
