import { z } from "zod";
import { MAX_ATTACHMENTS, MAX_BODY_LENGTH } from "@teamline/protocol";
import { ValidationError } from "../errors.js";

export const sendMessageBody = z.object({
  body: z.string().max(MAX_BODY_LENGTH).nullish(),
  attachments: z.array(z.string().min(1)).max(MAX_ATTACHMENTS).nullish(),
  reply_to_id: z.string().min(1).nullish(),
});

export const editMessageBody = z.object({
  body: z.string().max(MAX_BODY_LENGTH),
});

export const typingBody = z.object({
  is_typing: z.boolean().default(true),
});

export const readBody = z.object({
  message_id: z.string().min(1),
});

export const conversationBody = z.object({
  organization_id: z.string().min(1),
  user_id: z.string().min(1),
});

export const historyQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional(),
  before: z.coerce.number().int().optional(),
});

export const inboxQuery = z.object({
  view: z.enum(["active", "archived", "all"]).optional(),
  unread_only: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .optional(),
  order: z.enum(["asc", "desc"]).optional(),
  limit: z.coerce.number().int().min(1).max(100).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

/** Parse untrusted input or fail with a 400 naming the first bad field */
export function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value ?? {});
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".");
    throw new ValidationError(field ? `${field}: ${issue?.message}` : (issue?.message ?? "Invalid request"));
  }
  return result.data;
}
