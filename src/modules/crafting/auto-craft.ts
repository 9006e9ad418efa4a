/**
 * Auto-Craft Loop.
 *
 * Purpose: repeat the same craft for one player until a bound is reached, a
 * craft fails or the loop is cancelled. Cooldowns do not end the loop: it
 * waits out the remaining time and tries again.
 *
 * Invariants:
 * - At most one loop per player; starting a new one cancels the previous.
 * - The per-recipe `autoEnabled` flag is true while the loop runs and is
 *   reset to false on every exit path.
 * - Cancellation is observed between iterations (during the delay or a
 *   cooldown wait); an attempt already inside the engine completes.
 */
import { setTimeout as delay } from "node:timers/promises";
import type { CraftingSettings } from "@/configuration/definitions";
import type { PlayerId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { CooldownRepository } from "./cooldown/repository";
import { CooldownTracker } from "./cooldown/tracker";
import type { CraftingEngine } from "./engine";
import { describeAutoCraft, failureOutcome } from "./messages";
import {
  CraftingError,
  type AutoCraftStopReason,
  type AutoCraftSummary,
  type CraftOutcome,
  type CraftResultSummary,
  type Recipe,
} from "./types";

export const AUTO_CRAFT_DELAY_MS = 500;

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

const defaultSleep: Sleep = (ms, signal) => delay(ms, undefined, { signal });

export interface AutoCraftLoopDeps {
  readonly engine: CraftingEngine;
  readonly cooldowns: CooldownRepository;
  readonly delayMs?: number;
  readonly sleep?: Sleep;
  readonly now?: () => Date;
}

export interface AutoCraftRunInput {
  readonly playerId: PlayerId;
  readonly recipe: Recipe;
  /** Maximum successful crafts (a positive integer); unbounded when omitted. */
  readonly bound?: number;
  /** Read before every attempt so admin changes apply mid-loop. */
  readonly loadSettings: () => Promise<Result<CraftingSettings, Error>>;
  readonly signal?: AbortSignal;
}

interface RunningLoop {
  readonly controller: AbortController;
  readonly recipeName: string;
}

export class AutoCraftLoop {
  private readonly engine: CraftingEngine;
  private readonly cooldowns: CooldownRepository;
  private readonly delayMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly running = new Map<PlayerId, RunningLoop>();

  constructor(deps: AutoCraftLoopDeps) {
    this.engine = deps.engine;
    this.cooldowns = deps.cooldowns;
    this.delayMs = deps.delayMs ?? AUTO_CRAFT_DELAY_MS;
    this.sleep = deps.sleep ?? defaultSleep;
    this.now = deps.now ?? (() => new Date());
  }

  isRunning(playerId: PlayerId): boolean {
    return this.running.has(playerId);
  }

  /** Requests the player's loop to stop; false when none is running. */
  cancel(playerId: PlayerId): boolean {
    const loop = this.running.get(playerId);
    if (!loop) return false;
    loop.controller.abort();
    return true;
  }

  async run(input: AutoCraftRunInput): Promise<Result<AutoCraftSummary, Error>> {
    const { playerId, recipe } = input;
    const bound = input.bound ?? Number.POSITIVE_INFINITY;

    this.cancel(playerId);
    const controller = new AbortController();
    const entry: RunningLoop = { controller, recipeName: recipe.name };
    this.running.set(playerId, entry);
    const onExternalAbort = () => controller.abort();
    input.signal?.addEventListener("abort", onExternalAbort, { once: true });

    const results: CraftResultSummary[] = [];
    let attempts = 0;
    let stopReason: AutoCraftStopReason = "bound_reached";
    let lastFailure: CraftOutcome | undefined;

    console.log("[AutoCraft] Loop started", { playerId, recipe: recipe.name, bound });

    try {
      const flagged = await this.cooldowns.setAutoEnabled(playerId, recipe.name, true);
      if (flagged.isErr()) return ErrResult(flagged.error);

      while (results.length < bound) {
        if (controller.signal.aborted) {
          stopReason = "cancelled";
          break;
        }

        const settings = await input.loadSettings();
        if (settings.isErr()) return ErrResult(settings.error);

        const status = await new CooldownTracker(this.cooldowns).checkReady(
          playerId,
          recipe,
          settings.value,
          this.now(),
        );
        if (status.isErr()) return ErrResult(status.error);
        if (!status.value.ready) {
          if (!(await this.pause(status.value.remainingSeconds, controller.signal))) {
            stopReason = "cancelled";
            break;
          }
          continue;
        }

        attempts += 1;
        const res = await this.engine.execute(
          { mode: "auto", playerId, recipe },
          settings.value,
        );
        if (res.isErr()) {
          if (!(res.error instanceof CraftingError)) return ErrResult(res.error);
          // Another craft advanced the cooldown after the readiness check.
          if (res.error.code === "ON_COOLDOWN") {
            const waitSeconds = res.error.details.remainingSeconds ?? 0;
            if (!(await this.pause(waitSeconds, controller.signal))) {
              stopReason = "cancelled";
              break;
            }
            continue;
          }
          lastFailure = failureOutcome(res.error);
          stopReason = "failed";
          break;
        }
        results.push(res.value);
        if (results.length >= bound) break;

        if (!(await this.pause(0, controller.signal))) {
          stopReason = "cancelled";
          break;
        }
      }

      const crafted = results.length;
      return OkResult({
        recipeName: recipe.name,
        crafted,
        attempts,
        stopReason,
        results,
        lastFailure,
        message: describeAutoCraft(recipe.name, crafted, stopReason, lastFailure),
      });
    } finally {
      input.signal?.removeEventListener("abort", onExternalAbort);
      const current = this.running.get(playerId);
      if (current === entry) this.running.delete(playerId);

      // A newer loop on the same recipe owns the flag now.
      const superseded = current !== undefined && current !== entry;
      if (!superseded || current.recipeName !== recipe.name) {
        const reset = await this.cooldowns.setAutoEnabled(playerId, recipe.name, false);
        if (reset.isErr()) {
          console.error("[AutoCraft] Failed to reset auto flag:", {
            playerId,
            recipe: recipe.name,
            error: reset.error,
          });
        }
      }
      console.log("[AutoCraft] Loop finished", {
        playerId,
        recipe: recipe.name,
        crafted: results.length,
        attempts,
        stopReason,
      });
    }
  }

  /**
   * Waits the inter-iteration delay, or the remaining cooldown when longer.
   * Resolves false when the loop was cancelled during the wait.
   */
  private async pause(cooldownSeconds: number, signal: AbortSignal): Promise<boolean> {
    const ms = Math.max(this.delayMs, Math.ceil(cooldownSeconds * 1000));
    try {
      await this.sleep(ms, signal);
      return true;
    } catch (error) {
      if (!signal.aborted) throw error;
      return false;
    }
  }
}
