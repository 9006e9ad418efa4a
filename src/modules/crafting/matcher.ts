/**
 * Recipe matching.
 *
 * Pure functions over recipes and per-kind counts. Nothing here reads storage,
 * so results only depend on the arguments (same input, same output).
 */
import type { ItemKind } from "@/db/types";
import type {
  IngredientRequirement,
  IngredientShortfall,
  Recipe,
} from "./types";

/**
 * Merges requirements naming the same kind. Order follows the first
 * appearance of each kind in the recipe.
 */
export function sumRequirements(
  ingredients: readonly IngredientRequirement[],
): IngredientRequirement[] {
  const totals = new Map<ItemKind, number>();
  for (const req of ingredients) {
    totals.set(req.itemKind, (totals.get(req.itemKind) ?? 0) + req.quantity);
  }
  return [...totals].map(([itemKind, quantity]) => ({ itemKind, quantity }));
}

export function countByKind(
  items: Iterable<{ readonly itemKind: ItemKind }>,
): Map<ItemKind, number> {
  const counts = new Map<ItemKind, number>();
  for (const item of items) {
    counts.set(item.itemKind, (counts.get(item.itemKind) ?? 0) + 1);
  }
  return counts;
}

/** First summed requirement the counts do not cover, or null. */
export function findShortfall(
  recipe: Recipe,
  counts: ReadonlyMap<ItemKind, number>,
): IngredientShortfall | null {
  for (const req of sumRequirements(recipe.ingredients)) {
    const owned = counts.get(req.itemKind) ?? 0;
    if (owned < req.quantity) {
      return { itemKind: req.itemKind, required: req.quantity, owned };
    }
  }
  return null;
}

/** Every requirement that is not covered, for listings. */
export function listShortfalls(
  recipe: Recipe,
  counts: ReadonlyMap<ItemKind, number>,
): IngredientShortfall[] {
  return sumRequirements(recipe.ingredients)
    .map((req) => ({
      itemKind: req.itemKind,
      required: req.quantity,
      owned: counts.get(req.itemKind) ?? 0,
    }))
    .filter((entry) => entry.owned < entry.required);
}

/** Enabled recipes fully satisfiable by `counts`, in catalog order. */
export function findCraftable(
  counts: ReadonlyMap<ItemKind, number>,
  recipes: readonly Recipe[],
): Recipe[] {
  return recipes.filter(
    (recipe) => recipe.enabled && findShortfall(recipe, counts) === null,
  );
}

export function firstCraftable(
  counts: ReadonlyMap<ItemKind, number>,
  recipes: readonly Recipe[],
): Recipe | null {
  return (
    recipes.find(
      (recipe) => recipe.enabled && findShortfall(recipe, counts) === null,
    ) ?? null
  );
}
