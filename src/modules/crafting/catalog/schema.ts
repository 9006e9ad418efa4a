/**
 * Recipe document schema (`crafting_recipes`).
 *
 * Quantities are strictly positive integers; `description`, `enabled`,
 * `allowAuto` and `cooldownSeconds` fall back to their defaults.
 */
import { z } from "zod";
import type { Recipe } from "../types";

export const RECIPES_COLLECTION = "crafting_recipes";

const QuantitySchema = z.number().int().positive();

export const IngredientRequirementSchema = z.object({
  itemKind: z.string().trim().min(1),
  quantity: QuantitySchema,
});

export const RecipeResultSchema = z.object({
  itemKind: z.string().trim().min(1),
  quantity: QuantitySchema,
  modifier: z.string().trim().min(1).optional(),
});

export const RecipeSchema = z.object({
  name: z.string().trim().min(1).max(100),
  description: z.string().catch(""),
  enabled: z.boolean().catch(true),
  allowAuto: z.boolean().catch(true),
  cooldownSeconds: z.number().nonnegative().catch(0),
  ingredients: z.array(IngredientRequirementSchema),
  result: RecipeResultSchema,
});

export const RecipeDocSchema = RecipeSchema.extend({
  _id: z.unknown(),
});

export type RecipeDoc = z.infer<typeof RecipeDocSchema>;

/** Input accepted by `defineRecipe`; defaults fill the optional fields. */
export type RecipeInput = z.input<typeof RecipeSchema>;

export function toRecipe(doc: RecipeDoc): Recipe {
  const { _id, ...recipe } = doc;
  return recipe;
}

/** Validates a recipe literal and applies defaults. Throws on invalid input. */
export function defineRecipe(input: RecipeInput): Recipe {
  return RecipeSchema.parse(input);
}
