/**
 * Crafting Audit Types.
 *
 * Purpose: one append-only entry per craft attempt with a resolved recipe.
 */
import type { AuditEntryId, ItemInstanceId, PlayerId, RecipeName } from "@/db/types";
import type { Result } from "@/utils/result";
import type { CraftMode, CraftingErrorCode } from "../types";

export interface CraftAuditMetadata {
  readonly mode: CraftMode;
  /** Set on failures; `STORAGE_FAILURE` for backend faults. */
  readonly code?: CraftingErrorCode | "STORAGE_FAILURE";
  readonly consumedIds?: readonly ItemInstanceId[];
  readonly mintedIds?: readonly ItemInstanceId[];
  readonly remainingSeconds?: number;
}

export interface CraftAuditEntry {
  readonly id: AuditEntryId;
  readonly playerId: PlayerId;
  readonly recipeName: RecipeName;
  readonly success: boolean;
  readonly message: string;
  readonly timestamp: Date;
  readonly metadata: CraftAuditMetadata;
}

export type CreateCraftAuditInput = Omit<CraftAuditEntry, "id">;

export interface AuditSink {
  append(entry: CreateCraftAuditInput): Promise<Result<CraftAuditEntry, Error>>;
  /** Newest first. */
  listByPlayer(playerId: PlayerId, limit?: number): Promise<Result<CraftAuditEntry[], Error>>;
}
