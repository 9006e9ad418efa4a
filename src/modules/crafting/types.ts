/**
 * Crafting system types.
 *
 * Purpose: recipes, craft requests/results, caller-facing outcomes and the
 * crafting error taxonomy.
 */

import type { ItemInstanceId, ItemKind, PlayerId, RecipeName } from "@/db/types";

/** A single item requirement for a recipe. */
export interface IngredientRequirement {
  readonly itemKind: ItemKind;
  readonly quantity: number;
}

/** What a recipe grants. */
export interface RecipeResult {
  readonly itemKind: ItemKind;
  readonly quantity: number;
  /** Special applied to every minted item. */
  readonly modifier?: string;
}

/** A crafting recipe definition. */
export interface Recipe {
  readonly name: RecipeName;
  readonly description: string;
  readonly enabled: boolean;
  /** Whether players may auto-craft this recipe. */
  readonly allowAuto: boolean;
  /** Extra cooldown applied after crafting this recipe. */
  readonly cooldownSeconds: number;
  readonly ingredients: readonly IngredientRequirement[];
  readonly result: RecipeResult;
}

export type CraftMode = "direct" | "staged" | "auto";

/** A staged reference held by a crafting session. */
export interface SessionItem {
  readonly itemId: ItemInstanceId;
  readonly itemKind: ItemKind;
  readonly stagedAt: Date;
}

/**
 * Input for one engine run. A staged run draws its ingredients only from the
 * session as read inside the unit of work.
 */
export interface CraftRequest {
  readonly mode: CraftMode;
  readonly playerId: PlayerId;
  readonly recipe: Recipe;
}

/** Result of a committed craft. */
export interface CraftResultSummary {
  readonly recipeName: RecipeName;
  readonly itemKind: ItemKind;
  readonly quantity: number;
  readonly mintedIds: ItemInstanceId[];
  readonly consumedIds: ItemInstanceId[];
  readonly modifier?: string;
  readonly craftedAt: Date;
}

/** Missing ingredient reported by requirement checks. */
export interface IngredientShortfall {
  readonly itemKind: ItemKind;
  readonly required: number;
  readonly owned: number;
}

/** Caller-facing outcome of any crafting operation. */
export interface CraftOutcome {
  readonly success: boolean;
  readonly message: string;
  readonly code?: CraftingErrorCode;
  readonly remainingCooldownSeconds?: number;
  readonly shortfall?: IngredientShortfall;
  readonly resultSummary?: CraftResultSummary;
}

/** Recipe listing entry with availability for one player. */
export interface RecipeView {
  readonly recipe: Recipe;
  readonly craftable: boolean;
  readonly missing: IngredientShortfall[];
}

/** Snapshot of a player's staging session. */
export interface SessionView {
  readonly playerId: PlayerId;
  readonly items: readonly SessionItem[];
  readonly counts: Record<ItemKind, number>;
  readonly craftable: Recipe[];
  readonly expiresAt: Date;
  readonly expiresInSeconds: number;
}

export type AutoCraftStopReason = "bound_reached" | "failed" | "cancelled";

export interface AutoCraftSummary {
  readonly recipeName: RecipeName | null;
  readonly crafted: number;
  readonly attempts: number;
  readonly stopReason: AutoCraftStopReason;
  readonly results: CraftResultSummary[];
  readonly lastFailure?: CraftOutcome;
  readonly message: string;
}

/** Error codes for crafting operations. */
export type CraftingErrorCode =
  | "FEATURE_DISABLED"
  | "RECIPE_NOT_FOUND"
  | "ON_COOLDOWN"
  | "INSUFFICIENT_INGREDIENTS"
  | "ALREADY_STAGED"
  | "NOT_STAGED"
  | "ITEM_NOT_FOUND"
  | "NO_SESSION_ACTIVE"
  | "NO_CRAFTABLE_RECIPE"
  | "COMMIT_FAILURE"
  | "INVALID_LOOP_BOUND";

export interface CraftingErrorDetails {
  readonly remainingSeconds?: number;
  readonly shortfall?: IngredientShortfall;
}

/**
 * Expected, locally handled crafting failure.
 *
 * Anything thrown or returned that is not a `CraftingError` is a backend fault.
 */
export class CraftingError extends Error {
  constructor(
    public readonly code: CraftingErrorCode,
    message: string,
    public readonly details: CraftingErrorDetails = {},
  ) {
    super(message);
    this.name = "CraftingError";
  }
}
