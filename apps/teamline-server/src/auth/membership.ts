import type { Db } from "../db/database.js";

/** Scope membership checks backed by the directory tables */
export interface MembershipDirectory {
  isProjectMember(userId: string, projectId: string): Promise<boolean>;
  isProjectAdmin(userId: string, projectId: string): Promise<boolean>;
  isConversationParticipant(userId: string, conversationId: string): Promise<boolean>;
  isOrgMember(userId: string, orgId: string): Promise<boolean>;
}

export class SqliteMembershipDirectory implements MembershipDirectory {
  constructor(private readonly db: Db) {}

  async isProjectMember(userId: string, projectId: string): Promise<boolean> {
    return this.exists("SELECT 1 FROM project_members WHERE project_id = ? AND user_id = ?", projectId, userId);
  }

  async isProjectAdmin(userId: string, projectId: string): Promise<boolean> {
    return this.exists(
      "SELECT 1 FROM project_members WHERE project_id = ? AND user_id = ? AND is_admin = 1",
      projectId,
      userId
    );
  }

  async isConversationParticipant(userId: string, conversationId: string): Promise<boolean> {
    return this.exists(
      "SELECT 1 FROM chat_conversations WHERE id = ? AND (user1_id = ? OR user2_id = ?)",
      conversationId,
      userId,
      userId
    );
  }

  async isOrgMember(userId: string, orgId: string): Promise<boolean> {
    return this.exists("SELECT 1 FROM organization_members WHERE org_id = ? AND user_id = ?", orgId, userId);
  }

  addOrgMember(orgId: string, userId: string): void {
    this.db.prepare("INSERT OR IGNORE INTO organization_members (org_id, user_id) VALUES (?, ?)").run(orgId, userId);
  }

  addProjectMember(projectId: string, userId: string, isAdmin = false): void {
    this.db
      .prepare(
        `INSERT INTO project_members (project_id, user_id, is_admin) VALUES (?, ?, ?)
         ON CONFLICT(project_id, user_id) DO UPDATE SET is_admin = excluded.is_admin`
      )
      .run(projectId, userId, isAdmin ? 1 : 0);
  }

  projectMemberIds(projectId: string): string[] {
    return this.db
      .prepare<[string], { user_id: string }>("SELECT user_id FROM project_members WHERE project_id = ? ORDER BY user_id")
      .all(projectId)
      .map((row) => row.user_id);
  }

  private exists(sql: string, ...params: string[]): boolean {
    return this.db.prepare<string[], { 1: number }>(sql).get(...params) !== undefined;
  }
}
