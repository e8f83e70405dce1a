import { v4 as uuid } from "uuid";
import type { Conversation } from "@teamline/protocol";
import type { Db } from "../db/database.js";
import { NotFoundError, ValidationError } from "../errors.js";

export class ConversationStore {
  constructor(private readonly db: Db) {}

  get(id: string): Conversation | undefined {
    return this.db
      .prepare<[string], Conversation>("SELECT * FROM chat_conversations WHERE id = ?")
      .get(id);
  }

  require(id: string): Conversation {
    const conversation = this.get(id);
    if (!conversation) throw new NotFoundError("Conversation not found");
    return conversation;
  }

  /**
   * Find or create the conversation between two users of an organization.
   * Participants are sorted to ensure deterministic lookup.
   */
  findOrCreate(organizationId: string, userA: string, userB: string): Conversation {
    if (userA === userB) {
      throw new ValidationError("Cannot start a conversation with yourself");
    }
    const [user1, user2] = [userA, userB].sort();

    const existing = this.db
      .prepare<[string, string, string], Conversation>(
        "SELECT * FROM chat_conversations WHERE organization_id = ? AND user1_id = ? AND user2_id = ?"
      )
      .get(organizationId, user1, user2);
    if (existing) return existing;

    const conversation: Conversation = {
      id: uuid(),
      organization_id: organizationId,
      user1_id: user1,
      user2_id: user2,
      created_at: Date.now(),
    };
    this.db
      .prepare(
        "INSERT INTO chat_conversations (id, organization_id, user1_id, user2_id, created_at) VALUES (?, ?, ?, ?, ?)"
      )
      .run(conversation.id, conversation.organization_id, conversation.user1_id, conversation.user2_id, conversation.created_at);
    return conversation;
  }

  /** The participant that is not `userId` */
  otherParticipant(conversation: Conversation, userId: string): string {
    return conversation.user1_id === userId ? conversation.user2_id : conversation.user1_id;
  }
}
