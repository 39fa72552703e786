/**
 * Chat turns recorded by revision sessions.
 */

import { z } from "zod";
import { ChatSender } from "../config/engine/enums.js";
import { TopicKey } from "../topics/schema.js";

export const ChatTurnKind = z.enum(["message", "error"]);
export type ChatTurnKind = z.infer<typeof ChatTurnKind>;

export const ChatTurnSchema = z
  .object({
    id: z.string().min(1),
    topicKey: TopicKey,
    sender: ChatSender,
    kind: ChatTurnKind,
    text: z.string(),
    at: z.string().datetime(),
    /** Note the turn was about, and its revision at the time */
    noteId: z.string().min(1),
    noteRevision: z.number().int().min(1),
  })
  .strict();
export type ChatTurn = z.infer<typeof ChatTurnSchema>;
