import { z } from "zod";

export const INBOX_EVENT_TYPES = [
  "organization_invitation",
  "task_assigned",
  "task_unassigned",
  "direct_message",
  "task_completed",
] as const;

export type InboxEventType = (typeof INBOX_EVENT_TYPES)[number];

export const inboxItemSchema = z.object({
  id: z.string(),
  user_id: z.string(),
  org_id: z.string(),
  user_by: z.string().nullable(),
  title: z.string(),
  message: z.string(),
  event_type: z.enum(INBOX_EVENT_TYPES),
  reference_id: z.string().nullable(),
  is_read: z.boolean(),
  is_archived: z.boolean(),
  created_at: z.number(),
});

export type InboxItem = z.infer<typeof inboxItemSchema>;

/** Server → client frames on the inbox scope */
export const inboxEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("inbox_new"),
    data: inboxItemSchema,
    unread_count: z.number().int().nonnegative(),
  }),
  z.object({ type: z.literal("inbox_read"), inbox_id: z.string() }),
  z.object({ type: z.literal("inbox_archived"), inbox_id: z.string() }),
  z.object({ type: z.literal("inbox_deleted"), inbox_id: z.string() }),
  z.object({ type: z.literal("unread_count"), count: z.number().int().nonnegative() }),
]);

export type InboxEvent = z.infer<typeof inboxEventSchema>;
export type InboxEventKind = InboxEvent["type"];

export const INBOX_EVENT_KINDS = [
  "inbox_new",
  "inbox_read",
  "inbox_archived",
  "inbox_deleted",
  "unread_count",
] as const satisfies readonly InboxEventKind[];

/**
 * Envelope published on the notification bus. `payload` holds every field of
 * the inbox frame except `type`.
 */
export const notificationEventSchema = z.object({
  user_id: z.string().min(1),
  org_id: z.string().min(1),
  type: z.enum(INBOX_EVENT_KINDS),
  payload: z.record(z.unknown()).default({}),
});

export type NotificationEvent = z.infer<typeof notificationEventSchema>;

/** Split an inbox frame into the bus envelope shape */
export function toNotificationEvent(
  userId: string,
  orgId: string,
  event: InboxEvent
): NotificationEvent {
  const { type, ...payload } = event;
  return { user_id: userId, org_id: orgId, type, payload };
}
