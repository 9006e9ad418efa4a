/**
 * Cooldown documents.
 *
 * - `crafting_profiles`: one row per player, `_id = playerId`, holds the
 *   global cooldown timestamp.
 * - `crafting_recipe_states`: one row per (player, recipe), compound `_id =
 *   { playerId, recipeName }`, holds the recipe cooldown and the auto flag.
 *
 * Rows are created lazily by upsert and never deleted.
 */
import { z } from "zod";
import type { PlayerId, RecipeName } from "@/db/types";

export const PROFILES_COLLECTION = "crafting_profiles";
export const RECIPE_STATES_COLLECTION = "crafting_recipe_states";

export const CraftingProfileDocSchema = z.object({
  _id: z.string(),
  lastCraftedAt: z.coerce.date().nullable().catch(null),
});

export type CraftingProfileDoc = z.infer<typeof CraftingProfileDocSchema>;

export const RecipeStateKeySchema = z.object({
  playerId: z.string(),
  recipeName: z.string(),
});

export type RecipeStateKey = z.infer<typeof RecipeStateKeySchema>;

export const RecipeStateDocSchema = z.object({
  _id: RecipeStateKeySchema,
  playerId: z.string(),
  recipeName: z.string(),
  lastCraftedAt: z.coerce.date().nullable().catch(null),
  autoEnabled: z.boolean().catch(false),
});

export type RecipeStateDoc = z.infer<typeof RecipeStateDocSchema>;

export interface RecipeCooldownState {
  readonly playerId: PlayerId;
  readonly recipeName: RecipeName;
  readonly lastCraftedAt: Date | null;
  readonly autoEnabled: boolean;
}

/** Field order is fixed: Mongo compares embedded `_id` documents field by field. */
export const recipeStateId = (playerId: PlayerId, recipeName: RecipeName): RecipeStateKey => ({
  playerId,
  recipeName,
});

export function toRecipeCooldownState(doc: RecipeStateDoc): RecipeCooldownState {
  return {
    playerId: doc.playerId,
    recipeName: doc.recipeName,
    lastCraftedAt: doc.lastCraftedAt,
    autoEnabled: doc.autoEnabled,
  };
}
