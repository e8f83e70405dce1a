import { z } from "zod";
import { MAX_ATTACHMENTS, MAX_BODY_LENGTH } from "./messages.js";

/** Client → Server frames on project and DM scopes */

export const messageCommandSchema = z.object({
  type: z.literal("message"),
  body: z.string().max(MAX_BODY_LENGTH).nullish(),
  attachments: z.array(z.string().min(1)).max(MAX_ATTACHMENTS).nullish(),
  reply_to_id: z.string().min(1).nullish(),
});

export const typingCommandSchema = z.object({
  type: z.literal("typing"),
  is_typing: z.boolean().default(false),
});

export const readCommandSchema = z.object({
  type: z.literal("read"),
  message_id: z.string().min(1),
});

export const clientCommandSchema = z.discriminatedUnion("type", [
  messageCommandSchema,
  typingCommandSchema,
  readCommandSchema,
]);

export type MessageCommand = z.infer<typeof messageCommandSchema>;
export type TypingCommand = z.infer<typeof typingCommandSchema>;
export type ReadCommand = z.infer<typeof readCommandSchema>;
export type ClientCommand = z.infer<typeof clientCommandSchema>;
export type CommandType = ClientCommand["type"];

const COMMAND_TYPES: readonly string[] = ["message", "typing", "read"] satisfies CommandType[];

export type DecodeResult =
  | { ok: true; command: ClientCommand }
  | { ok: false; error: string };

/** Decode one text frame into a command. Never throws. */
export function decodeCommand(raw: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, error: "Invalid JSON" };
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return { ok: false, error: "Event must be a JSON object" };
  }

  const type: unknown = Reflect.get(parsed, "type");
  if (typeof type !== "string") {
    return { ok: false, error: "Event type is required" };
  }
  if (!COMMAND_TYPES.includes(type)) {
    return { ok: false, error: `Unknown event type: ${type}` };
  }

  const result = clientCommandSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".");
    return {
      ok: false,
      error: field ? `Invalid ${type} event: ${field}: ${issue.message}` : `Invalid ${type} event`,
    };
  }
  return { ok: true, command: result.data };
}
