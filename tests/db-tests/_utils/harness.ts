/**
 * Shared fixtures for the crafting suites: a memory backend, a controllable
 * clock and a service wired to both.
 */
import { StaticSettingsProvider, type CraftingSettings } from "@/configuration";
import { createMemoryBackend, type MemoryBackend } from "@/db/memory/backend";
import { createCraftingService } from "@/index";
import type { Sleep } from "@/modules/crafting/auto-craft";
import { defineRecipe, type RecipeInput } from "@/modules/crafting/catalog/schema";
import type { CraftingService } from "@/modules/crafting/service";
import type { Recipe } from "@/modules/crafting/types";
import type { Result } from "@/utils/result";

export const T0 = new Date("2026-01-01T00:00:00.000Z");

export class TestClock {
  private current: number;

  constructor(start: Date = T0) {
    this.current = start.getTime();
  }

  readonly now = (): Date => new Date(this.current);

  advance(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export const recipe = (input: RecipeInput): Recipe => defineRecipe(input);

/** 2 × Eagle → 1 × Phoenix. */
export const FUSION = recipe({
  name: "Fusion",
  ingredients: [{ itemKind: "Eagle", quantity: 2 }],
  result: { itemKind: "Phoenix", quantity: 1 },
});

export const noSleep: Sleep = async () => undefined;

/** Resolves at once after moving the clock forward by the requested delay. */
export function clockSleep(clock: TestClock, log: number[] = []): Sleep {
  return async (ms) => {
    log.push(ms);
    clock.advance(ms / 1000);
  };
}

export interface Harness {
  readonly clock: TestClock;
  readonly backend: MemoryBackend;
  readonly settings: StaticSettingsProvider;
  readonly service: CraftingService;
}

export interface HarnessOptions {
  readonly recipes?: readonly Recipe[];
  readonly settings?: Partial<CraftingSettings>;
  readonly sleep?: Sleep;
  readonly clock?: TestClock;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = options.clock ?? new TestClock();
  const backend = createMemoryBackend(options.recipes ?? [FUSION]);
  const settings = new StaticSettingsProvider(options.settings);
  const service = createCraftingService({
    backend,
    settings,
    // Settings changes apply to the next call.
    settingsTtlMs: 0,
    now: clock.now,
    sleep: options.sleep ?? noSleep,
  });
  return { clock, backend, settings, service };
}

export function expectOk<T>(result: Result<T, Error>): T {
  if (result.isErr()) throw result.error;
  return result.value;
}

export async function grant(
  h: Harness,
  playerId: string,
  itemKind: string,
  count: number,
  acquiredAt: Date = h.clock.now(),
): Promise<string[]> {
  return expectOk(await h.backend.grantItems(playerId, itemKind, count, { acquiredAt }));
}

/** Unconsumed item count per kind for one player. */
export async function ownedCounts(
  h: Harness,
  playerId: string,
): Promise<Record<string, number>> {
  const state = await h.backend.db.snapshot();
  const counts: Record<string, number> = {};
  for (const item of state.items.values()) {
    if (item.ownerId !== playerId || item.withdrawn) continue;
    counts[item.itemKind] = (counts[item.itemKind] ?? 0) + 1;
  }
  return counts;
}
