import type { MessageAuthor } from "./user.js";

export const MAX_BODY_LENGTH = 10_000;
export const MAX_ATTACHMENTS = 5;

export type MessageType = "text" | "file";

interface BaseMessage {
  id: string;
  body: string | null;
  /** Attachment ids in the order they were sent */
  attachments: string[];
  message_type: MessageType;
  created_at: number;
  edited_at: number | null;
  /** Soft-delete tombstone; body and attachments are blanked once set */
  deleted_at: number | null;
}

export interface ProjectMessage extends BaseMessage {
  chat_type: "project";
  project_id: string;
  user_id: string;
  reply_to_id: string | null;
  read_by: string[];
  user?: MessageAuthor;
}

export interface DirectMessage extends BaseMessage {
  chat_type: "direct";
  conversation_id: string;
  organization_id: string;
  sender_id: string;
  receiver_id: string;
  read_at: number | null;
  sender?: MessageAuthor;
  receiver?: MessageAuthor;
}

export type ChatMessage = ProjectMessage | DirectMessage;

export function authorOf(message: ChatMessage): string {
  return message.chat_type === "project" ? message.user_id : message.sender_id;
}

/** Two-party conversation; participants are stored sorted */
export interface Conversation {
  id: string;
  organization_id: string;
  user1_id: string;
  user2_id: string;
  created_at: number;
}

export interface MessageInput {
  body?: string | null;
  attachments?: string[] | null;
  reply_to_id?: string | null;
}
