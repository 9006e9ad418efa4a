/**
 * Cooldown Tracker.
 *
 * Gates crafts on two independent cooldowns: a global one per player
 * (`settings.globalCooldownSeconds`) and one per (player, recipe)
 * (`recipe.cooldownSeconds`). A craft is allowed only when both have elapsed.
 *
 * `commit` must run inside the same unit of work that consumes and mints, so
 * the timestamps advance if and only if the craft commits.
 */
import type { PlayerId } from "@/db/types";
import type { CraftingSettings } from "@/configuration/definitions";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { Recipe } from "../types";
import type { CooldownRepository } from "./repository";

export interface CooldownSnapshot {
  readonly globalLastCraftedAt: Date | null;
  readonly recipeLastCraftedAt: Date | null;
}

export interface CooldownStatus {
  readonly ready: boolean;
  /** Larger of the two remaining values. */
  readonly remainingSeconds: number;
  readonly globalRemaining: number;
  readonly recipeRemaining: number;
}

function remaining(last: Date | null, cooldownSeconds: number, now: Date): number {
  if (!last || cooldownSeconds <= 0) return 0;
  const elapsed = (now.getTime() - last.getTime()) / 1000;
  return Math.max(0, cooldownSeconds - elapsed);
}

export function computeCooldown(
  snapshot: CooldownSnapshot,
  globalCooldownSeconds: number,
  recipeCooldownSeconds: number,
  now: Date,
): CooldownStatus {
  const globalRemaining = remaining(snapshot.globalLastCraftedAt, globalCooldownSeconds, now);
  const recipeRemaining = remaining(snapshot.recipeLastCraftedAt, recipeCooldownSeconds, now);
  return {
    ready: globalRemaining === 0 && recipeRemaining === 0,
    remainingSeconds: Math.max(globalRemaining, recipeRemaining),
    globalRemaining,
    recipeRemaining,
  };
}

export class CooldownTracker {
  constructor(private readonly repo: CooldownRepository) {}

  async snapshot(
    playerId: PlayerId,
    recipe: Recipe,
  ): Promise<Result<CooldownSnapshot, Error>> {
    const global = await this.repo.getGlobal(playerId);
    if (global.isErr()) return ErrResult(global.error);

    const state = await this.repo.getRecipeState(playerId, recipe.name);
    if (state.isErr()) return ErrResult(state.error);

    return OkResult({
      globalLastCraftedAt: global.value,
      recipeLastCraftedAt: state.value?.lastCraftedAt ?? null,
    });
  }

  async checkReady(
    playerId: PlayerId,
    recipe: Recipe,
    settings: CraftingSettings,
    now: Date,
  ): Promise<Result<CooldownStatus, Error>> {
    const snap = await this.snapshot(playerId, recipe);
    if (snap.isErr()) return ErrResult(snap.error);
    return OkResult(
      computeCooldown(snap.value, settings.globalCooldownSeconds, recipe.cooldownSeconds, now),
    );
  }

  commit(playerId: PlayerId, recipe: Recipe, now: Date): Promise<Result<void, Error>> {
    return this.repo.touch(playerId, recipe.name, now);
  }
}
