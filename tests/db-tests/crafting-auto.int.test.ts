/**
 * Auto-Craft Integration Tests (in-process backend).
 *
 * Covers loop bounds, stop-on-failure, the auto flag lifecycle, cancellation
 * and supersession.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { Sleep } from "@/modules/crafting/auto-craft";
import {
  clockSleep,
  createHarness,
  expectOk,
  FUSION,
  grant,
  ownedCounts,
  recipe,
  T0,
  TestClock,
  type Harness,
} from "./_utils/harness";

const PLAYER = "player_1";
const autoSettings = { allowAutoCrafting: true, globalCooldownSeconds: 0 };

async function autoFlag(h: Harness, recipeName = "Fusion"): Promise<boolean | undefined> {
  return expectOk(await h.backend.cooldowns.getRecipeState(PLAYER, recipeName))?.autoEnabled;
}

/** A sleep that never resolves on its own and signals when the loop reaches it. */
function blockingSleep(): { sleep: Sleep; reached: Promise<void> } {
  let markReached: () => void = () => undefined;
  const reached = new Promise<void>((resolve) => {
    markReached = resolve;
  });
  const sleep: Sleep = (_ms, signal) => {
    markReached();
    return new Promise<void>((_resolve, reject) => {
      signal.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  };
  return { sleep, reached };
}

describe("setAutoCraft", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("crafts until ingredients run out, then stops and resets the flag", async () => {
    const h = createHarness({ settings: autoSettings });
    await grant(h, PLAYER, "Eagle", 4);

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "Fusion", 3));

    expect(summary.crafted).toBe(2);
    expect(summary.attempts).toBe(3);
    expect(summary.stopReason).toBe("failed");
    expect(summary.results).toHaveLength(2);
    expect(summary.lastFailure?.code).toBe("INSUFFICIENT_INGREDIENTS");
    expect(summary.message).toBe(
      'Auto-crafted "Fusion" 2 time(s). Stopped: Not enough Eagle: requires 2, you have 0.',
    );
    expect(await autoFlag(h)).toBe(false);
    expect(await ownedCounts(h, PLAYER)).toEqual({ Phoenix: 2 });

    const audit = expectOk(await h.service.history(PLAYER));
    expect(audit.map((e) => e.success)).toEqual([false, true, true]);
    expect(audit.every((e) => e.metadata.mode === "auto")).toBe(true);
  });

  it("stops at the bound", async () => {
    const h = createHarness({ settings: autoSettings });
    await grant(h, PLAYER, "Eagle", 10);

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "fusion", 2));

    expect(summary.recipeName).toBe("Fusion");
    expect(summary.crafted).toBe(2);
    expect(summary.attempts).toBe(2);
    expect(summary.stopReason).toBe("bound_reached");
    expect(summary.message).toBe('Auto-crafted "Fusion" 2 time(s).');
    expect(await ownedCounts(h, PLAYER)).toEqual({ Eagle: 6, Phoenix: 2 });
  });

  it("waits out the global cooldown between crafts under default settings", async () => {
    const clock = new TestClock();
    const waits: number[] = [];
    const h = createHarness({
      clock,
      sleep: clockSleep(clock, waits),
      settings: { allowAutoCrafting: true },
    });
    await grant(h, PLAYER, "Eagle", 4);

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "Fusion", 3));

    expect(summary.crafted).toBe(2);
    expect(summary.attempts).toBe(3);
    expect(summary.stopReason).toBe("failed");
    expect(summary.lastFailure?.code).toBe("INSUFFICIENT_INGREDIENTS");
    expect(summary.results.map((r) => r.craftedAt)).toEqual([
      T0,
      new Date(T0.getTime() + 10_000),
    ]);
    expect(waits).toEqual([500, 9500, 500, 9500]);
    expect(await ownedCounts(h, PLAYER)).toEqual({ Phoenix: 2 });

    // Cooldown waits are not attempts, so nothing extra is audited.
    const audit = expectOk(await h.service.history(PLAYER));
    expect(audit.map((e) => e.metadata.code)).toEqual([
      "INSUFFICIENT_INGREDIENTS",
      undefined,
      undefined,
    ]);
  });

  it("waits out a recipe cooldown left by an earlier craft", async () => {
    const clock = new TestClock();
    const waits: number[] = [];
    const slow = recipe({
      name: "Slow",
      cooldownSeconds: 30,
      ingredients: [{ itemKind: "Eagle", quantity: 1 }],
      result: { itemKind: "Owl", quantity: 1 },
    });
    const h = createHarness({
      clock,
      recipes: [slow],
      sleep: clockSleep(clock, waits),
      settings: autoSettings,
    });
    await grant(h, PLAYER, "Eagle", 2);
    expect(expectOk(await h.service.craftDirect(PLAYER, "Slow")).success).toBe(true);
    clock.advance(5);

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "Slow", 1));

    expect(summary.stopReason).toBe("bound_reached");
    expect(summary.crafted).toBe(1);
    expect(waits).toEqual([25_000]);
  });

  it("does nothing while auto-crafting is disabled", async () => {
    const h = createHarness({ settings: { globalCooldownSeconds: 0 } });
    await grant(h, PLAYER, "Eagle", 2);

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "Fusion", 1));

    expect(summary.stopReason).toBe("failed");
    expect(summary.lastFailure?.code).toBe("FEATURE_DISABLED");
    expect(summary.message).toBe("Auto-crafting is currently disabled.");
    expect(await autoFlag(h)).toBeUndefined();
    expect(expectOk(await h.service.history(PLAYER))).toEqual([]);
  });

  it("refuses recipes that do not allow auto-crafting", async () => {
    const manual = recipe({
      name: "Manual",
      allowAuto: false,
      ingredients: [],
      result: { itemKind: "Owl", quantity: 1 },
    });
    const h = createHarness({ recipes: [FUSION, manual], settings: autoSettings });

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "Manual"));
    expect(summary.message).toBe('Auto-crafting is not allowed for recipe "Manual".');
    expect(summary.recipeName).toBe("Manual");
  });

  it("reports an unknown recipe", async () => {
    const h = createHarness({ settings: autoSettings });

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "Nope"));
    expect(summary.recipeName).toBeNull();
    expect(summary.lastFailure?.code).toBe("RECIPE_NOT_FOUND");
  });

  it("is cancelled between iterations and resets the flag", async () => {
    const { sleep, reached } = blockingSleep();
    const h = createHarness({ settings: autoSettings, sleep });
    await grant(h, PLAYER, "Eagle", 10);

    const pending = h.service.setAutoCraft(PLAYER, "Fusion");
    await reached;
    expect(await autoFlag(h)).toBe(true);
    expect(h.service.autoCraft.isRunning(PLAYER)).toBe(true);

    const stopped = expectOk(await h.service.setAutoCraft(PLAYER, "off"));
    expect(stopped.message).toBe("Auto-crafting stopped.");

    const summary = expectOk(await pending);
    expect(summary.stopReason).toBe("cancelled");
    expect(summary.crafted).toBe(1);
    expect(await autoFlag(h)).toBe(false);
    expect(h.service.autoCraft.isRunning(PLAYER)).toBe(false);
  });

  it.each([0, -1, 2.5, Number.NaN])("rejects a loop bound of %s", async (bound) => {
    const h = createHarness({ settings: autoSettings });
    await grant(h, PLAYER, "Eagle", 10);

    const summary = expectOk(await h.service.setAutoCraft(PLAYER, "Fusion", bound));

    expect(summary.stopReason).toBe("failed");
    expect(summary.attempts).toBe(0);
    expect(summary.lastFailure?.code).toBe("INVALID_LOOP_BOUND");
    expect(summary.message).toBe(`Loop bound must be a positive whole number, got ${bound}.`);
    expect(await ownedCounts(h, PLAYER)).toEqual({ Eagle: 10 });
  });

  it("cancelAutoCraft answers even when no loop is running", async () => {
    const h = createHarness({ settings: autoSettings });

    const stopped = expectOk(await h.service.cancelAutoCraft(PLAYER));

    expect(stopped).toEqual({
      recipeName: null,
      crafted: 0,
      attempts: 0,
      stopReason: "cancelled",
      results: [],
      message: "Auto-crafting stopped.",
    });
    expect(h.service.autoCraft.isRunning(PLAYER)).toBe(false);
  });

  it("supersedes a running loop when a new one starts", async () => {
    const { sleep, reached } = blockingSleep();
    const h = createHarness({ settings: autoSettings, sleep });
    await grant(h, PLAYER, "Eagle", 10);

    const first = h.service.setAutoCraft(PLAYER, "Fusion");
    await reached;

    const second = expectOk(await h.service.setAutoCraft(PLAYER, "Fusion", 1));
    expect(second.stopReason).toBe("bound_reached");
    expect(second.crafted).toBe(1);

    const firstSummary = expectOk(await first);
    expect(firstSummary.stopReason).toBe("cancelled");
    expect(await autoFlag(h)).toBe(false);
    expect(await ownedCounts(h, PLAYER)).toEqual({ Eagle: 6, Phoenix: 2 });
  });
});
