/**
 * Crafting Audit Repository.
 *
 * Purpose: persist craft attempts in the `crafting_logs` collection.
 * Entries are written after the unit of work and never updated.
 */
import type { Collection } from "mongodb";
import { z } from "zod";
import { getDb } from "@/db/mongo";
import { generateId, parseDocument, toError } from "@/db/helpers";
import type { PlayerId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type {
  AuditSink,
  CraftAuditEntry,
  CraftAuditMetadata,
  CreateCraftAuditInput,
} from "./types";

export const AUDIT_COLLECTION = "crafting_logs";

const CraftAuditDocSchema = z.object({
  _id: z.string(),
  playerId: z.string(),
  recipeName: z.string(),
  success: z.boolean(),
  message: z.string().catch(""),
  timestamp: z.coerce.date().catch(() => new Date()),
  metadata: z
    .object({
      mode: z.enum(["direct", "staged", "auto"]),
      code: z
        .enum([
          "FEATURE_DISABLED",
          "RECIPE_NOT_FOUND",
          "ON_COOLDOWN",
          "INSUFFICIENT_INGREDIENTS",
          "ALREADY_STAGED",
          "NOT_STAGED",
          "ITEM_NOT_FOUND",
          "NO_SESSION_ACTIVE",
          "NO_CRAFTABLE_RECIPE",
          "COMMIT_FAILURE",
          "INVALID_LOOP_BOUND",
          "STORAGE_FAILURE",
        ])
        .optional(),
      consumedIds: z.array(z.string()).optional(),
      mintedIds: z.array(z.string()).optional(),
      remainingSeconds: z.number().optional(),
    })
    .catch({ mode: "direct" }),
});

type CraftAuditDoc = z.infer<typeof CraftAuditDocSchema>;

export async function auditCollection(): Promise<Collection<CraftAuditDoc>> {
  return (await getDb()).collection<CraftAuditDoc>(AUDIT_COLLECTION);
}

/** Copies metadata without undefined keys (the driver would store them as null). */
function toDocMetadata(metadata: CraftAuditMetadata): CraftAuditDoc["metadata"] {
  const doc: CraftAuditDoc["metadata"] = { mode: metadata.mode };
  if (metadata.code) doc.code = metadata.code;
  if (metadata.consumedIds) doc.consumedIds = [...metadata.consumedIds];
  if (metadata.mintedIds) doc.mintedIds = [...metadata.mintedIds];
  if (metadata.remainingSeconds !== undefined) {
    doc.remainingSeconds = metadata.remainingSeconds;
  }
  return doc;
}

const generateAuditId = (): string => generateId("craft");

export const DEFAULT_AUDIT_LIMIT = 20;

export class MongoAuditSink implements AuditSink {
  async append(
    entry: CreateCraftAuditInput,
  ): Promise<Result<CraftAuditEntry, Error>> {
    const created: CraftAuditEntry = { id: generateAuditId(), ...entry };
    try {
      const col = await auditCollection();
      const { id, metadata, ...rest } = created;
      await col.insertOne({
        _id: id,
        ...rest,
        metadata: toDocMetadata(metadata),
      });
      return OkResult(created);
    } catch (error) {
      console.error("[CraftingAudit] Failed to write audit entry:", error);
      return ErrResult(toError(error));
    }
  }

  async listByPlayer(
    playerId: PlayerId,
    limit = DEFAULT_AUDIT_LIMIT,
  ): Promise<Result<CraftAuditEntry[], Error>> {
    try {
      const col = await auditCollection();
      const docs = await col
        .find({ playerId })
        .sort({ timestamp: -1 })
        .limit(limit)
        .toArray();

      const entries: CraftAuditEntry[] = [];
      for (const doc of docs) {
        const parsed = parseDocument(CraftAuditDocSchema, doc, "CraftingAudit");
        if (!parsed) continue;
        const { _id, ...rest } = parsed;
        entries.push({ id: _id, ...rest });
      }
      return OkResult(entries);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}
