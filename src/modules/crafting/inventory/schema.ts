/**
 * Zod schema for owned item documents (`ball_instances`).
 *
 * Invariants:
 * - `withdrawn` defaults to false; a withdrawn item is never counted or selected.
 * - Dates are coerced from strings/numbers.
 */
import { z } from "zod";
import { generateId } from "@/db/helpers";
import type { OwnedItemRecord } from "./port";

export const ITEMS_COLLECTION = "ball_instances";

export const OwnedItemDocSchema = z.object({
  _id: z.string(),
  ownerId: z.string(),
  itemKind: z.string().min(1),
  modifier: z.string().nullable().catch(null),
  withdrawn: z.boolean().catch(false),
  acquiredAt: z.coerce.date(),
  withdrawnAt: z.coerce.date().nullable().catch(null),
});

export type OwnedItemDoc = z.infer<typeof OwnedItemDocSchema>;

export function toOwnedItemRecord(doc: OwnedItemDoc): OwnedItemRecord {
  return {
    id: doc._id,
    ownerId: doc.ownerId,
    itemKind: doc.itemKind,
    modifier: doc.modifier,
    withdrawn: doc.withdrawn,
    acquiredAt: doc.acquiredAt,
    withdrawnAt: doc.withdrawnAt,
  };
}

/** Ids of minted items. */
export function generateItemId(): string {
  return generateId("item");
}
