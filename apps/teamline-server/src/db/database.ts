import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";

export type Db = Database.Database;

/** Open (or create) the server database and bring its schema up to date. */
export function openDatabase(dataDir: string): Db {
  fs.mkdirSync(dataDir, { recursive: true });
  const db = new Database(path.join(dataDir, "teamline.sqlite"));
  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  runMigrations(db);
  return db;
}

/** In-memory database with the full schema, for tests and one-off tools. */
export function openMemoryDatabase(): Db {
  const db = new Database(":memory:");
  db.pragma("foreign_keys = ON");
  runMigrations(db);
  return db;
}

export function runMigrations(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS user_profiles (
      id TEXT PRIMARY KEY,
      display_name TEXT,
      avatar_url TEXT,
      email TEXT,
      updated_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS organization_members (
      org_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      PRIMARY KEY (org_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS project_members (
      project_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      is_admin INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (project_id, user_id)
    );

    CREATE TABLE IF NOT EXISTS chat_conversations (
      id TEXT PRIMARY KEY,
      organization_id TEXT NOT NULL,
      user1_id TEXT NOT NULL,
      user2_id TEXT NOT NULL,
      created_at INTEGER NOT NULL,
      UNIQUE (organization_id, user1_id, user2_id)
    );

    CREATE TABLE IF NOT EXISTS chat_messages (
      id TEXT PRIMARY KEY,
      project_id TEXT NOT NULL,
      user_id TEXT NOT NULL,
      body TEXT,
      attachments TEXT NOT NULL DEFAULT '[]',
      message_type TEXT NOT NULL CHECK(message_type IN ('text', 'file')),
      reply_to_id TEXT,
      read_by TEXT NOT NULL DEFAULT '[]',
      created_at INTEGER NOT NULL,
      edited_at INTEGER,
      deleted_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_chat_messages_project_time
      ON chat_messages(project_id, created_at);

    CREATE TABLE IF NOT EXISTS direct_messages (
      id TEXT PRIMARY KEY,
      conversation_id TEXT NOT NULL REFERENCES chat_conversations(id) ON DELETE CASCADE,
      organization_id TEXT NOT NULL,
      sender_id TEXT NOT NULL,
      receiver_id TEXT NOT NULL,
      body TEXT,
      attachments TEXT NOT NULL DEFAULT '[]',
      message_type TEXT NOT NULL CHECK(message_type IN ('text', 'file')),
      created_at INTEGER NOT NULL,
      edited_at INTEGER,
      deleted_at INTEGER,
      read_at INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_direct_messages_conversation_time
      ON direct_messages(conversation_id, created_at);

    CREATE TABLE IF NOT EXISTS chat_attachments (
      id TEXT PRIMARY KEY,
      message_id TEXT,
      message_type TEXT NOT NULL CHECK(message_type IN ('project', 'direct')),
      file_name TEXT NOT NULL,
      file_size INTEGER NOT NULL,
      file_type TEXT NOT NULL,
      storage_path TEXT NOT NULL,
      uploaded_by TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS inbox (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL,
      org_id TEXT NOT NULL,
      user_by TEXT,
      title TEXT NOT NULL,
      message TEXT NOT NULL,
      event_type TEXT NOT NULL,
      reference_id TEXT,
      is_read INTEGER NOT NULL DEFAULT 0,
      is_archived INTEGER NOT NULL DEFAULT 0,
      read_at INTEGER,
      archived_at INTEGER,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_inbox_user_org
      ON inbox(user_id, org_id, created_at);
  `);
}
