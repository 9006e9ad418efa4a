/**
 * Crafting Transaction Engine.
 *
 * Purpose: run one craft attempt (direct, staged or auto) from validation to
 * commit.
 *
 * Flow:
 * 1. Validate switches (outside the unit of work).
 * 2. Inside ONE unit of work: check cooldowns, check requirements, consume,
 *    mint, advance cooldowns and, for staged crafts, release consumed rows.
 * 3. Append an audit entry. A failed audit write is logged only.
 *
 * Result contract:
 * - `Ok(summary)` when the craft committed.
 * - `Err(CraftingError)` for expected failures (nothing was written).
 * - `Err(Error)` for storage faults (nothing was written either).
 */
import type { CraftingSettings } from "@/configuration/definitions";
import type { ItemKind } from "@/db/types";
import { ErrResult, OkResult, unwrapOrThrow, type Result } from "@/utils/result";
import type { AuditSink, CraftAuditMetadata } from "./audit/types";
import { TransactionConflictError, type TransactionScope, type UnitOfWork } from "./backend";
import { CooldownTracker } from "./cooldown/tracker";
import { InventoryError, type InventoryPort, type ItemRef } from "./inventory/port";
import { sumRequirements } from "./matcher";
import { isExpired } from "./session/schema";
import { craftingErrors, describeCraftResult } from "./messages";
import {
  CraftingError,
  type CraftRequest,
  type CraftResultSummary,
  type SessionItem,
} from "./types";

export interface CraftingEngineDeps {
  readonly unitOfWork: UnitOfWork;
  readonly audit: AuditSink;
  readonly now?: () => Date;
}

export class CraftingEngine {
  private readonly unitOfWork: UnitOfWork;
  private readonly audit: AuditSink;
  private readonly now: () => Date;

  constructor(deps: CraftingEngineDeps) {
    this.unitOfWork = deps.unitOfWork;
    this.audit = deps.audit;
    this.now = deps.now ?? (() => new Date());
  }

  async execute(
    request: CraftRequest,
    settings: CraftingSettings,
  ): Promise<Result<CraftResultSummary, Error>> {
    const rejected = validate(request, settings);
    if (rejected) {
      await this.record(request, rejected);
      return ErrResult(rejected);
    }

    const now = this.now();
    try {
      const summary = await this.unitOfWork.run((scope) =>
        this.commit(scope, request, settings, now),
      );
      await this.record(request, summary);
      return OkResult(summary);
    } catch (error) {
      const failure = classifyFailure(error);
      if (!(failure instanceof CraftingError)) {
        console.error("[CraftingEngine] Craft aborted by a storage fault:", {
          playerId: request.playerId,
          recipe: request.recipe.name,
          mode: request.mode,
          error: failure,
        });
      }
      await this.record(request, failure);
      return ErrResult(failure);
    }
  }

  private async commit(
    scope: TransactionScope,
    request: CraftRequest,
    settings: CraftingSettings,
    now: Date,
  ): Promise<CraftResultSummary> {
    const { playerId, recipe } = request;
    const tracker = new CooldownTracker(scope.cooldowns);

    const status = unwrapOrThrow(await tracker.checkReady(playerId, recipe, settings, now));
    if (!status.ready) {
      throw craftingErrors.onCooldown(status.remainingSeconds);
    }

    const inventory = scope.inventory(playerId);
    const refs =
      request.mode === "staged"
        ? await selectFromStaged(scope, request, now)
        : await selectFromInventory(inventory, request);

    unwrapOrThrow(await inventory.consume(refs));
    const mintedIds = unwrapOrThrow(
      await inventory.mint(recipe.result.itemKind, recipe.result.quantity, {
        modifier: recipe.result.modifier,
        acquiredAt: now,
      }),
    );
    unwrapOrThrow(await tracker.commit(playerId, recipe, now));

    const consumedIds = refs.map((ref) => ref.id);
    if (request.mode === "staged") {
      unwrapOrThrow(await scope.sessions.releaseItems(playerId, consumedIds));
    }

    return {
      recipeName: recipe.name,
      itemKind: recipe.result.itemKind,
      quantity: recipe.result.quantity,
      mintedIds,
      consumedIds,
      modifier: recipe.result.modifier,
      craftedAt: now,
    };
  }

  private async record(
    request: CraftRequest,
    outcome: CraftResultSummary | Error,
  ): Promise<void> {
    const base = {
      playerId: request.playerId,
      recipeName: request.recipe.name,
      timestamp: this.now(),
    };
    const entry =
      outcome instanceof Error
        ? {
            ...base,
            success: false,
            message: outcome.message,
            metadata: failureMetadata(request, outcome),
          }
        : {
            ...base,
            success: true,
            message: describeCraftResult(outcome),
            metadata: {
              mode: request.mode,
              consumedIds: outcome.consumedIds,
              mintedIds: outcome.mintedIds,
            },
          };

    const res = await this.audit.append(entry);
    if (res.isErr()) {
      console.error("[CraftingEngine] Audit write failed; craft outcome kept:", {
        playerId: request.playerId,
        recipe: request.recipe.name,
        error: res.error,
      });
    }
  }
}

function validate(request: CraftRequest, settings: CraftingSettings): CraftingError | null {
  const { recipe } = request;
  if (!settings.enabled) return craftingErrors.craftingDisabled();
  if (!recipe.enabled) return craftingErrors.recipeDisabled(recipe.name);
  if (request.mode === "auto") {
    if (!settings.allowAutoCrafting) return craftingErrors.autoCraftingDisabled();
    if (!recipe.allowAuto) return craftingErrors.autoNotAllowed(recipe.name);
  }
  return null;
}

/** Oldest-first selection from everything the player owns. */
async function selectFromInventory(
  inventory: InventoryPort,
  request: CraftRequest,
): Promise<ItemRef[]> {
  const requirements = sumRequirements(request.recipe.ingredients);

  // Every requirement is checked before anything is selected, so the
  // reported shortfall is the first unmet one in recipe order.
  for (const req of requirements) {
    const owned = unwrapOrThrow(await inventory.countAvailable(req.itemKind));
    if (owned < req.quantity) {
      throw craftingErrors.insufficient({
        itemKind: req.itemKind,
        required: req.quantity,
        owned,
      });
    }
  }

  const refs: ItemRef[] = [];
  for (const req of requirements) {
    refs.push(...unwrapOrThrow(await inventory.selectForConsumption(req.itemKind, req.quantity)));
  }
  return refs;
}

/**
 * Selection restricted to the session's staged references that are still
 * owned and unconsumed, in staging order. The session is re-read here so
 * rows removed or cleared before the commit are never consumed.
 */
async function selectFromStaged(
  scope: TransactionScope,
  request: CraftRequest,
  now: Date,
): Promise<ItemRef[]> {
  const session = unwrapOrThrow(await scope.sessions.find(request.playerId));
  if (!session || isExpired(session, now)) throw craftingErrors.noSession();

  const inventory = scope.inventory(request.playerId);
  const records = unwrapOrThrow(
    await inventory.getItems(session.items.map((item) => item.itemId)),
  );
  const available = new Set(
    records.filter((record) => !record.withdrawn).map((record) => record.id),
  );

  const byKind = new Map<ItemKind, SessionItem[]>();
  for (const item of session.items) {
    if (!available.has(item.itemId)) continue;
    const bucket = byKind.get(item.itemKind) ?? [];
    bucket.push(item);
    byKind.set(item.itemKind, bucket);
  }

  const requirements = sumRequirements(request.recipe.ingredients);
  for (const req of requirements) {
    const owned = byKind.get(req.itemKind)?.length ?? 0;
    if (owned < req.quantity) {
      throw craftingErrors.insufficient({
        itemKind: req.itemKind,
        required: req.quantity,
        owned,
      });
    }
  }

  return requirements.flatMap((req) =>
    (byKind.get(req.itemKind) ?? [])
      .slice(0, req.quantity)
      .map((item) => ({ id: item.itemId, itemKind: item.itemKind })),
  );
}

/** Maps anything thrown out of the unit of work to the error callers see. */
export function classifyFailure(error: unknown): Error {
  if (error instanceof CraftingError) return error;
  if (error instanceof InventoryError) {
    if (error.code === "INSUFFICIENT_STOCK" && error.stock) {
      return craftingErrors.insufficient({
        itemKind: error.stock.itemKind,
        required: error.stock.required,
        owned: error.stock.available,
      });
    }
    return craftingErrors.commitFailure(error.message);
  }
  if (error instanceof TransactionConflictError) {
    return craftingErrors.commitFailure(error.message);
  }
  return error instanceof Error ? error : new Error(String(error));
}

function failureMetadata(request: CraftRequest, error: Error): CraftAuditMetadata {
  if (!(error instanceof CraftingError)) {
    return { mode: request.mode, code: "STORAGE_FAILURE" };
  }
  return {
    mode: request.mode,
    code: error.code,
    remainingSeconds: error.details.remainingSeconds,
  };
}
