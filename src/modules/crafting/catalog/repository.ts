/**
 * Recipe Catalog.
 *
 * Purpose: read-only access to admin-defined recipes.
 *
 * Invariants:
 * - `listEnabledRecipes` is sorted by name (code-unit order) and stable across
 *   calls with unchanged data.
 * - `getRecipeByName` ignores case and surrounding whitespace.
 * - Invalid documents are logged and skipped, never returned.
 */
import type { Collection } from "mongodb";
import { getDb } from "@/db/mongo";
import { parseDocument, toError } from "@/db/helpers";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { Recipe } from "../types";
import {
  RECIPES_COLLECTION,
  RecipeDocSchema,
  toRecipe,
  type RecipeDoc,
} from "./schema";

export interface RecipeCatalog {
  listEnabledRecipes(): Promise<Result<Recipe[], Error>>;
  getRecipeByName(name: string): Promise<Result<Recipe | null, Error>>;
}

/** Case-insensitive comparison (ignores case, respects accents). */
export const RECIPE_NAME_COLLATION = { locale: "en", strength: 2 } as const;

export const byName = (a: Recipe, b: Recipe): number =>
  a.name < b.name ? -1 : a.name > b.name ? 1 : 0;

export async function recipesCollection(): Promise<Collection<RecipeDoc>> {
  return (await getDb()).collection<RecipeDoc>(RECIPES_COLLECTION);
}

export class MongoRecipeCatalog implements RecipeCatalog {
  async listEnabledRecipes(): Promise<Result<Recipe[], Error>> {
    try {
      const col = await recipesCollection();
      const docs = await col.find({ enabled: { $ne: false } }).toArray();
      const recipes: Recipe[] = [];
      for (const doc of docs) {
        const parsed = parseDocument(RecipeDocSchema, doc, "RecipeCatalog");
        if (parsed && parsed.enabled) recipes.push(toRecipe(parsed));
      }
      return OkResult(recipes.sort(byName));
    } catch (error) {
      console.error("[RecipeCatalog] Failed to list recipes:", error);
      return ErrResult(toError(error));
    }
  }

  async getRecipeByName(name: string): Promise<Result<Recipe | null, Error>> {
    const key = name.trim();
    if (!key) return OkResult(null);

    try {
      const col = await recipesCollection();
      const doc = await col.findOne(
        { name: key },
        { collation: RECIPE_NAME_COLLATION },
      );
      if (!doc) return OkResult(null);

      const parsed = parseDocument(RecipeDocSchema, doc, "RecipeCatalog");
      return OkResult(parsed ? toRecipe(parsed) : null);
    } catch (error) {
      console.error("[RecipeCatalog] Failed to load recipe:", { name: key, error });
      return ErrResult(toError(error));
    }
  }
}

/** In-process catalog over a fixed recipe list. */
export class StaticRecipeCatalog implements RecipeCatalog {
  private readonly recipes: readonly Recipe[];

  constructor(recipes: readonly Recipe[]) {
    this.recipes = [...recipes].sort(byName);
  }

  async listEnabledRecipes(): Promise<Result<Recipe[], Error>> {
    return OkResult(this.recipes.filter((recipe) => recipe.enabled));
  }

  async getRecipeByName(name: string): Promise<Result<Recipe | null, Error>> {
    const key = name.trim().toLowerCase();
    if (!key) return OkResult(null);
    return OkResult(
      this.recipes.find((recipe) => recipe.name.toLowerCase() === key) ?? null,
    );
  }
}
