/**
 * Crafting session documents (`crafting_sessions`).
 *
 * One document per player (`_id = playerId`); staged references are embedded
 * and an item id appears at most once.
 */
import { z } from "zod";
import type { PlayerId } from "@/db/types";
import type { SessionItem } from "../types";

export const SESSIONS_COLLECTION = "crafting_sessions";

export const SessionItemSchema = z.object({
  itemId: z.string(),
  itemKind: z.string(),
  stagedAt: z.coerce.date(),
});

export const SessionDocSchema = z.object({
  _id: z.string(),
  createdAt: z.coerce.date(),
  expiresAt: z.coerce.date(),
  items: z.array(SessionItemSchema).catch([]),
});

export type SessionDoc = z.infer<typeof SessionDocSchema>;

export interface CraftingSession {
  readonly playerId: PlayerId;
  readonly createdAt: Date;
  readonly expiresAt: Date;
  readonly items: readonly SessionItem[];
}

export function toCraftingSession(doc: SessionDoc): CraftingSession {
  return {
    playerId: doc._id,
    createdAt: doc.createdAt,
    expiresAt: doc.expiresAt,
    items: doc.items,
  };
}

export const isExpired = (session: CraftingSession, now: Date): boolean =>
  now.getTime() > session.expiresAt.getTime();
