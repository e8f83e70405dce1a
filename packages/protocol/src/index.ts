export type { ScopeType, ChatScopeType, ChatScope, ChatType } from "./scope.js";
export { chatTypeOf, scopeTypeOf, inboxScopeId } from "./scope.js";

export type { MessageAuthor, Identity } from "./user.js";

export type {
  MessageType,
  ProjectMessage,
  DirectMessage,
  ChatMessage,
  Conversation,
  MessageInput,
} from "./messages.js";
export { MAX_BODY_LENGTH, MAX_ATTACHMENTS, authorOf } from "./messages.js";

export type {
  MessageCommand,
  TypingCommand,
  ReadCommand,
  ClientCommand,
  CommandType,
  DecodeResult,
} from "./commands.js";
export {
  messageCommandSchema,
  typingCommandSchema,
  readCommandSchema,
  clientCommandSchema,
  decodeCommand,
} from "./commands.js";

export type {
  MessageEvent,
  MessageEditedEvent,
  MessageDeletedEvent,
  TypingEvent,
  ReadEvent,
  ErrorEvent,
  ChatEvent,
  ServerEvent,
  EventType,
  RecipientStamp,
  OutboundFrame,
} from "./events.js";
export { MESSAGE_FAMILY, CLOSE_AUTHENTICATION_FAILED, CLOSE_ACCESS_DENIED } from "./events.js";

export type { InboxEventType, InboxItem, InboxEvent, InboxEventKind, NotificationEvent } from "./inbox.js";
export {
  INBOX_EVENT_TYPES,
  INBOX_EVENT_KINDS,
  inboxItemSchema,
  inboxEventSchema,
  notificationEventSchema,
  toNotificationEvent,
} from "./inbox.js";
