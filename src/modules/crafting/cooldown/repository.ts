/**
 * Cooldown repository.
 *
 * Purpose: persist the global and per-recipe cooldown rows and the per-recipe
 * auto-craft flag.
 * Context: the engine uses a session-bound instance inside its unit of work;
 * the auto loop writes the flag through an unbound one.
 */
import type { ClientSession, Collection } from "mongodb";
import type { PlayerId, RecipeName } from "@/db/types";
import { getDb } from "@/db/mongo";
import { parseDocument, toError } from "@/db/helpers";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  CraftingProfileDocSchema,
  PROFILES_COLLECTION,
  RECIPE_STATES_COLLECTION,
  recipeStateId,
  RecipeStateDocSchema,
  toRecipeCooldownState,
  type CraftingProfileDoc,
  type RecipeCooldownState,
  type RecipeStateDoc,
} from "./schema";

export interface CooldownRepository {
  /** Last craft of any recipe, or null. */
  getGlobal(playerId: PlayerId): Promise<Result<Date | null, Error>>;
  getRecipeState(
    playerId: PlayerId,
    recipeName: RecipeName,
  ): Promise<Result<RecipeCooldownState | null, Error>>;
  /** Sets both timestamps to `at`, creating rows as needed. */
  touch(playerId: PlayerId, recipeName: RecipeName, at: Date): Promise<Result<void, Error>>;
  setAutoEnabled(
    playerId: PlayerId,
    recipeName: RecipeName,
    enabled: boolean,
  ): Promise<Result<void, Error>>;
  /** Resets the auto flag on every recipe row of the player. */
  clearAutoFlags(playerId: PlayerId): Promise<Result<void, Error>>;
}

async function profiles(): Promise<Collection<CraftingProfileDoc>> {
  return (await getDb()).collection<CraftingProfileDoc>(PROFILES_COLLECTION);
}

async function recipeStates(): Promise<Collection<RecipeStateDoc>> {
  return (await getDb()).collection<RecipeStateDoc>(RECIPE_STATES_COLLECTION);
}

export class MongoCooldownRepository implements CooldownRepository {
  constructor(private readonly session?: ClientSession) {}

  async getGlobal(playerId: PlayerId): Promise<Result<Date | null, Error>> {
    try {
      const col = await profiles();
      const doc = await col.findOne({ _id: playerId }, { session: this.session });
      if (!doc) return OkResult(null);
      const parsed = parseDocument(CraftingProfileDocSchema, doc, "CooldownRepository");
      return OkResult(parsed?.lastCraftedAt ?? null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async getRecipeState(
    playerId: PlayerId,
    recipeName: RecipeName,
  ): Promise<Result<RecipeCooldownState | null, Error>> {
    try {
      const col = await recipeStates();
      const doc = await col.findOne(
        { _id: recipeStateId(playerId, recipeName) },
        { session: this.session },
      );
      if (!doc) return OkResult(null);
      const parsed = parseDocument(RecipeStateDocSchema, doc, "CooldownRepository");
      return OkResult(parsed ? toRecipeCooldownState(parsed) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async touch(
    playerId: PlayerId,
    recipeName: RecipeName,
    at: Date,
  ): Promise<Result<void, Error>> {
    try {
      const [profileCol, stateCol] = await Promise.all([profiles(), recipeStates()]);
      await profileCol.updateOne(
        { _id: playerId },
        { $set: { lastCraftedAt: at } },
        { upsert: true, session: this.session },
      );
      await stateCol.updateOne(
        { _id: recipeStateId(playerId, recipeName) },
        {
          $set: { lastCraftedAt: at },
          $setOnInsert: { playerId, recipeName, autoEnabled: false },
        },
        { upsert: true, session: this.session },
      );
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async setAutoEnabled(
    playerId: PlayerId,
    recipeName: RecipeName,
    enabled: boolean,
  ): Promise<Result<void, Error>> {
    try {
      const col = await recipeStates();
      await col.updateOne(
        { _id: recipeStateId(playerId, recipeName) },
        {
          $set: { autoEnabled: enabled },
          $setOnInsert: { playerId, recipeName, lastCraftedAt: null },
        },
        { upsert: true, session: this.session },
      );
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async clearAutoFlags(playerId: PlayerId): Promise<Result<void, Error>> {
    try {
      const col = await recipeStates();
      await col.updateMany(
        { playerId, autoEnabled: true },
        { $set: { autoEnabled: false } },
        { session: this.session },
      );
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}
