import type { ChatMessage } from "./messages.js";
import type { InboxEvent } from "./inbox.js";

/** Server → Client events */

export interface MessageEvent {
  type: "message";
  data: ChatMessage;
}

export interface MessageEditedEvent {
  type: "message_edited";
  data: ChatMessage;
}

/** Carries only the id; content of deleted messages is never sent */
export interface MessageDeletedEvent {
  type: "message_deleted";
  message_id: string;
}

export interface TypingEvent {
  type: "typing";
  user_id: string;
  is_typing: boolean;
}

export interface ReadEvent {
  type: "read";
  user_id: string;
  /** The cursor the reader supplied */
  message_id: string;
  message_ids: string[];
}

export interface ErrorEvent {
  type: "error";
  message: string;
}

export type ChatEvent =
  | MessageEvent
  | MessageEditedEvent
  | MessageDeletedEvent
  | TypingEvent
  | ReadEvent
  | ErrorEvent;

export type ServerEvent = ChatEvent | InboxEvent;

export type EventType = ServerEvent["type"];

/** Per-recipient stamp added by the connection hub */
export interface RecipientStamp {
  is_own_message?: boolean;
  is_own?: boolean;
  sender_id?: string;
}

export type OutboundFrame = ServerEvent & RecipientStamp;

export const MESSAGE_FAMILY: ReadonlySet<EventType> = new Set<EventType>([
  "message",
  "message_edited",
  "message_deleted",
]);

/** Close codes used when the handshake is rejected after the upgrade */
export const CLOSE_AUTHENTICATION_FAILED = 4001;
export const CLOSE_ACCESS_DENIED = 4003;
