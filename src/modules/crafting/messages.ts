/**
 * Human-readable crafting messages.
 *
 * Every failure the engine or service reports is built here, so the wording
 * stays consistent across direct, staged and auto crafts.
 */
import type { ItemInstanceId, ItemKind, RecipeName } from "@/db/types";
import {
  CraftingError,
  type AutoCraftStopReason,
  type CraftOutcome,
  type CraftResultSummary,
  type IngredientShortfall,
} from "./types";

/** Seconds with one decimal, e.g. `4.5s`. */
export function formatSeconds(seconds: number): string {
  return `${Math.max(0, seconds).toFixed(1)}s`;
}

export function describeCraftResult(summary: CraftResultSummary): string {
  const special = summary.modifier ? ` with ${summary.modifier}` : "";
  const ids = summary.mintedIds.map((id) => `#${id}`).join(", ");
  return `Crafted ${summary.quantity} × ${summary.itemKind}${special}. New items: ${ids}`;
}

export function successOutcome(summary: CraftResultSummary): CraftOutcome {
  return { success: true, message: describeCraftResult(summary), resultSummary: summary };
}

export function infoOutcome(message: string): CraftOutcome {
  return { success: true, message };
}

export function failureOutcome(error: CraftingError): CraftOutcome {
  return {
    success: false,
    message: error.message,
    code: error.code,
    remainingCooldownSeconds: error.details.remainingSeconds,
    shortfall: error.details.shortfall,
  };
}

export function describeAutoCraft(
  recipeName: RecipeName,
  crafted: number,
  stopReason: AutoCraftStopReason,
  failure?: CraftOutcome,
): string {
  const head = `Auto-crafted "${recipeName}" ${crafted} time(s).`;
  switch (stopReason) {
    case "bound_reached":
      return head;
    case "cancelled":
      return `${head} Stopped: cancelled.`;
    case "failed":
      return `${head} Stopped: ${failure?.message ?? "craft failed."}`;
  }
}

export const stagingMessages = {
  added: (itemId: ItemInstanceId, itemKind: ItemKind) =>
    `Added ${itemKind} #${itemId} to crafting session!`,
  removed: (itemId: ItemInstanceId) => `Removed item #${itemId} from crafting session!`,
  cleared: () => "Cleared all ingredients from crafting session!",
  autoStopped: () => "Auto-crafting stopped.",
};

export const craftingErrors = {
  craftingDisabled: () =>
    new CraftingError("FEATURE_DISABLED", "Crafting is currently disabled."),

  recipeDisabled: (name: RecipeName) =>
    new CraftingError("FEATURE_DISABLED", `Recipe "${name}" is disabled.`),

  autoCraftingDisabled: () =>
    new CraftingError("FEATURE_DISABLED", "Auto-crafting is currently disabled."),

  autoNotAllowed: (name: RecipeName) =>
    new CraftingError(
      "FEATURE_DISABLED",
      `Auto-crafting is not allowed for recipe "${name}".`,
    ),

  recipeNotFound: (name: string) =>
    new CraftingError("RECIPE_NOT_FOUND", `Recipe "${name}" was not found.`),

  onCooldown: (remainingSeconds: number) =>
    new CraftingError(
      "ON_COOLDOWN",
      `You are on cooldown. Try again in ${formatSeconds(remainingSeconds)}.`,
      { remainingSeconds },
    ),

  insufficient: (shortfall: IngredientShortfall) =>
    new CraftingError(
      "INSUFFICIENT_INGREDIENTS",
      `Not enough ${shortfall.itemKind}: requires ${shortfall.required}, you have ${shortfall.owned}.`,
      { shortfall },
    ),

  alreadyStaged: (itemId: ItemInstanceId, itemKind: ItemKind) =>
    new CraftingError(
      "ALREADY_STAGED",
      `${itemKind} #${itemId} is already in your crafting session.`,
    ),

  notStaged: (itemId: ItemInstanceId) =>
    new CraftingError(
      "NOT_STAGED",
      `Item #${itemId} is not in your crafting session.`,
    ),

  itemNotFound: (itemId: ItemInstanceId) =>
    new CraftingError(
      "ITEM_NOT_FOUND",
      `Item #${itemId} was not found or you don't own it.`,
    ),

  noSession: () =>
    new CraftingError(
      "NO_SESSION_ACTIVE",
      "You don't have an active crafting session.",
    ),

  noCraftableRecipe: () =>
    new CraftingError(
      "NO_CRAFTABLE_RECIPE",
      "No recipe can be crafted with current ingredients.",
    ),

  invalidLoopBound: (bound: number) =>
    new CraftingError(
      "INVALID_LOOP_BOUND",
      `Loop bound must be a positive whole number, got ${bound}.`,
    ),

  commitFailure: (reason: string) =>
    new CraftingError("COMMIT_FAILURE", `Craft could not be completed: ${reason}`),
};
