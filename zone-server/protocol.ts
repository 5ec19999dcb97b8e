// zone-server/protocol.ts
//
// Client -> server messages. Everything else on the socket is ignored.

import { z } from "zod";

export const HelloMessageSchema = z.object({
  type: z.literal("hello"),
  player_id: z.string().min(1),
  // zone name or id; the first zone when omitted
  zone: z.string().min(1).optional(),
});

// Intents only the server itself enqueues.
export const SERVER_ONLY_ACTIONS: ReadonlySet<string> = new Set(["owner_disconnect"]);

export const IntentMessageSchema = z.object({
  type: z.literal("intent"),
  data: z
    .record(z.unknown())
    .refine((data) => typeof data.action !== "string" || !SERVER_ONLY_ACTIONS.has(data.action), {
      message: "action is reserved for the server",
    }),
});

export const ClientMessageSchema = z.discriminatedUnion("type", [HelloMessageSchema, IntentMessageSchema]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export function parseClientMessage(raw: string): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = ClientMessageSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}
