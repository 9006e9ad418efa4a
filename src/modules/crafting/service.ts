/**
 * Crafting Service.
 *
 * Purpose: caller-facing entry point for every crafting operation.
 *
 * Result contract:
 * - Expected failures (disabled, cooldown, missing ingredients, ...) come back
 *   as `Ok` outcomes with `success: false` and a `code`.
 * - `Err` is reserved for storage faults.
 *
 * Settings are loaded through the `SettingsStore` on every call and passed
 * into the engine explicitly.
 */
import type { SettingsStore } from "@/configuration/store";
import type { ItemInstanceId, ItemKind, PlayerId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { CraftAuditEntry } from "./audit/types";
import { AutoCraftLoop, type Sleep } from "./auto-craft";
import type { CraftingBackend } from "./backend";
import { CraftingEngine } from "./engine";
import { countByKind, findShortfall, firstCraftable, listShortfalls } from "./matcher";
import {
  craftingErrors,
  failureOutcome,
  infoOutcome,
  stagingMessages,
  successOutcome,
} from "./messages";
import { SessionStore } from "./session/store";
import {
  CraftingError,
  type AutoCraftSummary,
  type CraftOutcome,
  type CraftResultSummary,
  type RecipeView,
  type SessionView,
} from "./types";

export interface CraftingServiceDeps {
  readonly backend: CraftingBackend;
  readonly settings: SettingsStore;
  readonly now?: () => Date;
  /** Delay between auto-craft iterations. */
  readonly autoCraftDelayMs?: number;
  readonly sleep?: Sleep;
}

/** Keyword that turns auto-crafting off. */
export const AUTO_CRAFT_OFF = "off";

export class CraftingService {
  readonly engine: CraftingEngine;
  readonly sessions: SessionStore;
  readonly autoCraft: AutoCraftLoop;
  private readonly backend: CraftingBackend;
  private readonly settings: SettingsStore;

  constructor(deps: CraftingServiceDeps) {
    this.backend = deps.backend;
    this.settings = deps.settings;
    this.engine = new CraftingEngine({
      unitOfWork: deps.backend.unitOfWork,
      audit: deps.backend.audit,
      now: deps.now,
    });
    this.sessions = new SessionStore({
      repo: deps.backend.sessions,
      catalog: deps.backend.catalog,
      inventory: (ownerId) => deps.backend.inventory(ownerId),
      now: deps.now,
    });
    this.autoCraft = new AutoCraftLoop({
      engine: this.engine,
      cooldowns: deps.backend.cooldowns,
      delayMs: deps.autoCraftDelayMs,
      sleep: deps.sleep,
      now: deps.now,
    });
  }

  /** Crafts a recipe by name from the player's whole inventory. */
  async craftDirect(
    playerId: PlayerId,
    recipeName: string,
  ): Promise<Result<CraftOutcome, Error>> {
    const settings = await this.settings.get();
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value.enabled) {
      return OkResult(failureOutcome(craftingErrors.craftingDisabled()));
    }

    const found = await this.backend.catalog.getRecipeByName(recipeName);
    if (found.isErr()) return ErrResult(found.error);
    const recipe = found.value;
    if (!recipe) {
      return OkResult(failureOutcome(craftingErrors.recipeNotFound(recipeName.trim())));
    }

    const res = await this.engine.execute(
      { mode: "direct", playerId, recipe },
      settings.value,
    );
    return toOutcome(res);
  }

  async stageAdd(
    playerId: PlayerId,
    itemId: ItemInstanceId,
  ): Promise<Result<CraftOutcome, Error>> {
    const settings = await this.settings.get();
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value.enabled) {
      return OkResult(failureOutcome(craftingErrors.craftingDisabled()));
    }

    const items = await this.backend.inventory(playerId).getItems([itemId]);
    if (items.isErr()) return ErrResult(items.error);
    const record = items.value.find((item) => item.id === itemId && !item.withdrawn);
    if (!record) {
      return OkResult(failureOutcome(craftingErrors.itemNotFound(itemId)));
    }

    const session = await this.sessions.getOrCreate(playerId, settings.value);
    if (session.isErr()) return ErrResult(session.error);

    const added = await this.sessions.addItem(session.value, {
      itemId: record.id,
      itemKind: record.itemKind,
    });
    if (added.isErr()) return failureOrErr(added.error);
    return OkResult(infoOutcome(stagingMessages.added(record.id, record.itemKind)));
  }

  async stageRemove(
    playerId: PlayerId,
    itemId: ItemInstanceId,
  ): Promise<Result<CraftOutcome, Error>> {
    const settings = await this.settings.get();
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value.enabled) {
      return OkResult(failureOutcome(craftingErrors.craftingDisabled()));
    }

    const session = await this.sessions.getActive(playerId);
    if (session.isErr()) return ErrResult(session.error);
    if (!session.value) return OkResult(failureOutcome(craftingErrors.noSession()));

    const removed = await this.sessions.removeItem(session.value, itemId);
    if (removed.isErr()) return ErrResult(removed.error);
    if (!removed.value) {
      return OkResult(failureOutcome(craftingErrors.notStaged(itemId)));
    }
    return OkResult(infoOutcome(stagingMessages.removed(itemId)));
  }

  async stageClear(playerId: PlayerId): Promise<Result<CraftOutcome, Error>> {
    const settings = await this.settings.get();
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value.enabled) {
      return OkResult(failureOutcome(craftingErrors.craftingDisabled()));
    }

    const session = await this.sessions.getActive(playerId);
    if (session.isErr()) return ErrResult(session.error);
    if (!session.value) return OkResult(failureOutcome(craftingErrors.noSession()));

    const cleared = await this.sessions.clear(session.value);
    if (cleared.isErr()) return ErrResult(cleared.error);
    return OkResult(infoOutcome(stagingMessages.cleared()));
  }

  /** Crafts the first recipe (by name) the staged items satisfy. */
  async stageCraft(playerId: PlayerId): Promise<Result<CraftOutcome, Error>> {
    const settings = await this.settings.get();
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value.enabled) {
      return OkResult(failureOutcome(craftingErrors.craftingDisabled()));
    }

    const session = await this.sessions.getActive(playerId);
    if (session.isErr()) return ErrResult(session.error);
    if (!session.value) return OkResult(failureOutcome(craftingErrors.noSession()));

    const staged = await this.sessions.validItems(playerId);
    if (staged.isErr()) return ErrResult(staged.error);
    const recipes = await this.backend.catalog.listEnabledRecipes();
    if (recipes.isErr()) return ErrResult(recipes.error);

    const recipe = firstCraftable(countByKind(staged.value), recipes.value);
    if (!recipe) return OkResult(failureOutcome(craftingErrors.noCraftableRecipe()));

    const res = await this.engine.execute(
      { mode: "staged", playerId, recipe },
      settings.value,
    );
    return toOutcome(res);
  }

  /**
   * Starts an auto-craft loop and resolves with its summary, or stops the
   * running loop when `recipeName` is `"off"`.
   */
  async setAutoCraft(
    playerId: PlayerId,
    recipeName: string,
    loopBound?: number,
  ): Promise<Result<AutoCraftSummary, Error>> {
    if (recipeName.trim().toLowerCase() === AUTO_CRAFT_OFF) {
      return this.cancelAutoCraft(playerId);
    }
    if (loopBound !== undefined && !(Number.isInteger(loopBound) && loopBound > 0)) {
      return OkResult(rejectedSummary(null, craftingErrors.invalidLoopBound(loopBound)));
    }

    const settings = await this.settings.get();
    if (settings.isErr()) return ErrResult(settings.error);
    if (!settings.value.enabled) {
      return OkResult(rejectedSummary(null, craftingErrors.craftingDisabled()));
    }
    if (!settings.value.allowAutoCrafting) {
      return OkResult(rejectedSummary(null, craftingErrors.autoCraftingDisabled()));
    }

    const found = await this.backend.catalog.getRecipeByName(recipeName);
    if (found.isErr()) return ErrResult(found.error);
    const recipe = found.value;
    if (!recipe) {
      return OkResult(
        rejectedSummary(null, craftingErrors.recipeNotFound(recipeName.trim())),
      );
    }
    if (!recipe.allowAuto) {
      return OkResult(rejectedSummary(recipe.name, craftingErrors.autoNotAllowed(recipe.name)));
    }

    return this.autoCraft.run({
      playerId,
      recipe,
      bound: loopBound,
      loadSettings: () => this.settings.get(),
    });
  }

  /** Stops the player's auto loop (if any) and clears every auto flag. */
  async cancelAutoCraft(playerId: PlayerId): Promise<Result<AutoCraftSummary, Error>> {
    this.autoCraft.cancel(playerId);
    const cleared = await this.backend.cooldowns.clearAutoFlags(playerId);
    if (cleared.isErr()) return ErrResult(cleared.error);
    return OkResult({
      recipeName: null,
      crafted: 0,
      attempts: 0,
      stopReason: "cancelled",
      results: [],
      message: stagingMessages.autoStopped(),
    });
  }

  /** Enabled recipes with availability against the player's inventory. */
  async listRecipes(playerId: PlayerId): Promise<Result<RecipeView[], Error>> {
    const recipes = await this.backend.catalog.listEnabledRecipes();
    if (recipes.isErr()) return ErrResult(recipes.error);

    const inventory = this.backend.inventory(playerId);
    const counts = new Map<ItemKind, number>();
    for (const recipe of recipes.value) {
      for (const req of recipe.ingredients) {
        if (counts.has(req.itemKind)) continue;
        const owned = await inventory.countAvailable(req.itemKind);
        if (owned.isErr()) return ErrResult(owned.error);
        counts.set(req.itemKind, owned.value);
      }
    }

    return OkResult(
      recipes.value.map((recipe) => ({
        recipe,
        craftable: findShortfall(recipe, counts) === null,
        missing: listShortfalls(recipe, counts),
      })),
    );
  }

  async viewSession(playerId: PlayerId): Promise<Result<SessionView | null, Error>> {
    const session = await this.sessions.getActive(playerId);
    if (session.isErr()) return ErrResult(session.error);
    if (!session.value) return OkResult(null);
    return this.sessions.describe(session.value);
  }

  /** Recent craft attempts of the player, newest first. */
  history(playerId: PlayerId, limit?: number): Promise<Result<CraftAuditEntry[], Error>> {
    return this.backend.audit.listByPlayer(playerId, limit);
  }
}

function toOutcome(res: Result<CraftResultSummary, Error>): Result<CraftOutcome, Error> {
  if (res.isOk()) return OkResult(successOutcome(res.value));
  return failureOrErr(res.error);
}

function failureOrErr(error: Error): Result<CraftOutcome, Error> {
  if (error instanceof CraftingError) return OkResult(failureOutcome(error));
  return ErrResult(error);
}

function rejectedSummary(
  recipeName: string | null,
  error: CraftingError,
): AutoCraftSummary {
  return {
    recipeName,
    crafted: 0,
    attempts: 0,
    stopReason: "failed",
    results: [],
    lastFailure: failureOutcome(error),
    message: error.message,
  };
}
