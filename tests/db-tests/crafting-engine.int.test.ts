/**
 * Crafting Engine Integration Tests (in-process backend).
 *
 * Covers direct crafts: insufficient ingredients, successful exchange, FIFO
 * selection, cooldowns, atomic rollback, no double spend and audit behavior.
 */
import { afterEach, describe, expect, it, vi } from "vitest";
import type { CraftingBackend, TransactionScope } from "@/modules/crafting/backend";
import type { InventoryPort } from "@/modules/crafting/inventory/port";
import { createCraftingService } from "@/index";
import { ErrResult } from "@/utils/result";
import {
  createHarness,
  expectOk,
  FUSION,
  grant,
  ownedCounts,
  recipe,
  T0,
  type Harness,
} from "./_utils/harness";

const PLAYER = "player_1";

function withFailingMint(port: InventoryPort): InventoryPort {
  return {
    ownerId: port.ownerId,
    countAvailable: (kind) => port.countAvailable(kind),
    selectForConsumption: (kind, quantity) => port.selectForConsumption(kind, quantity),
    consume: (refs) => port.consume(refs),
    getItems: (ids) => port.getItems(ids),
    mint: async () => ErrResult(new Error("disk full")),
  };
}

/** Same backend, but every mint inside a unit of work fails. */
function failingMintBackend(h: Harness): CraftingBackend {
  const { backend } = h;
  return {
    catalog: backend.catalog,
    cooldowns: backend.cooldowns,
    sessions: backend.sessions,
    audit: backend.audit,
    inventory: (ownerId) => backend.inventory(ownerId),
    unitOfWork: {
      run: <T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> =>
        backend.unitOfWork.run((scope) =>
          work({
            cooldowns: scope.cooldowns,
            sessions: scope.sessions,
            inventory: (ownerId) => withFailingMint(scope.inventory(ownerId)),
          }),
        ),
    },
  };
}

async function auditOf(h: Harness) {
  return expectOk(await h.service.history(PLAYER));
}

describe("craftDirect", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("reports the shortfall and changes nothing when ingredients are missing", async () => {
    const h = createHarness();
    await grant(h, PLAYER, "Eagle", 1);

    const outcome = expectOk(await h.service.craftDirect(PLAYER, "Fusion"));

    expect(outcome.success).toBe(false);
    expect(outcome.code).toBe("INSUFFICIENT_INGREDIENTS");
    expect(outcome.shortfall).toEqual({ itemKind: "Eagle", required: 2, owned: 1 });
    expect(outcome.message).toBe("Not enough Eagle: requires 2, you have 1.");
    expect(await ownedCounts(h, PLAYER)).toEqual({ Eagle: 1 });
    expect(expectOk(await h.backend.cooldowns.getGlobal(PLAYER))).toBeNull();

    const audit = await auditOf(h);
    expect(audit).toHaveLength(1);
    expect(audit[0]?.success).toBe(false);
    expect(audit[0]?.metadata.code).toBe("INSUFFICIENT_INGREDIENTS");
  });

  it("exchanges ingredients for the result and advances cooldowns", async () => {
    const h = createHarness();
    const eagles = await grant(h, PLAYER, "Eagle", 3);

    const outcome = expectOk(await h.service.craftDirect(PLAYER, "Fusion"));

    expect(outcome.success).toBe(true);
    expect(outcome.message).toBe("Crafted 1 × Phoenix. New items: #item_000004");
    expect(outcome.resultSummary?.consumedIds).toEqual([eagles[0], eagles[1]]);
    expect(outcome.resultSummary?.mintedIds).toEqual(["item_000004"]);
    expect(await ownedCounts(h, PLAYER)).toEqual({ Eagle: 1, Phoenix: 1 });

    expect(expectOk(await h.backend.cooldowns.getGlobal(PLAYER))).toEqual(T0);
    const state = expectOk(await h.backend.cooldowns.getRecipeState(PLAYER, "Fusion"));
    expect(state?.lastCraftedAt).toEqual(T0);

    const audit = await auditOf(h);
    expect(audit).toHaveLength(1);
    expect(audit[0]?.success).toBe(true);
    expect(audit[0]?.metadata.mintedIds).toEqual(["item_000004"]);
  });

  it("looks recipes up ignoring case and whitespace", async () => {
    const h = createHarness();
    await grant(h, PLAYER, "Eagle", 2);

    const outcome = expectOk(await h.service.craftDirect(PLAYER, "  fUSION "));
    expect(outcome.success).toBe(true);
    expect(outcome.resultSummary?.recipeName).toBe("Fusion");
  });

  it("does not audit an unknown recipe", async () => {
    const h = createHarness();

    const outcome = expectOk(await h.service.craftDirect(PLAYER, "Nope"));
    expect(outcome.code).toBe("RECIPE_NOT_FOUND");
    expect(outcome.message).toBe('Recipe "Nope" was not found.');
    expect(await auditOf(h)).toEqual([]);
  });

  it("consumes the oldest items first", async () => {
    const h = createHarness();
    const [middle] = await grant(h, PLAYER, "Eagle", 1, new Date("2026-01-02T00:00:00Z"));
    const [oldest] = await grant(h, PLAYER, "Eagle", 1, new Date("2025-12-31T00:00:00Z"));
    const [newest] = await grant(h, PLAYER, "Eagle", 1, new Date("2026-01-03T00:00:00Z"));

    const outcome = expectOk(await h.service.craftDirect(PLAYER, "Fusion"));
    expect(outcome.resultSummary?.consumedIds).toEqual([oldest, middle]);

    const remaining = expectOk(await h.backend.inventory(PLAYER).getItems([newest]));
    expect(remaining[0]?.withdrawn).toBe(false);
  });

  it("sums repeated ingredient lines", async () => {
    const twin = recipe({
      name: "Twin",
      ingredients: [
        { itemKind: "Eagle", quantity: 1 },
        { itemKind: "Hawk", quantity: 1 },
        { itemKind: "Eagle", quantity: 1 },
      ],
      result: { itemKind: "Griffin", quantity: 1, modifier: "Shiny" },
    });
    const h = createHarness({ recipes: [twin] });
    await grant(h, PLAYER, "Eagle", 1);
    await grant(h, PLAYER, "Hawk", 1);

    const short = expectOk(await h.service.craftDirect(PLAYER, "Twin"));
    expect(short.shortfall).toEqual({ itemKind: "Eagle", required: 2, owned: 1 });

    await grant(h, PLAYER, "Eagle", 1);
    h.clock.advance(60);
    const done = expectOk(await h.service.craftDirect(PLAYER, "Twin"));
    expect(done.success).toBe(true);
    expect(done.message).toBe("Crafted 1 × Griffin with Shiny. New items: #item_000004");

    const minted = expectOk(await h.backend.inventory(PLAYER).getItems(["item_000004"]));
    expect(minted[0]?.modifier).toBe("Shiny");
  });

  describe("cooldowns", () => {
    it("blocks a second craft inside the global cooldown", async () => {
      const h = createHarness();
      await grant(h, PLAYER, "Eagle", 4);

      expect(expectOk(await h.service.craftDirect(PLAYER, "Fusion")).success).toBe(true);

      h.clock.advance(4);
      const blocked = expectOk(await h.service.craftDirect(PLAYER, "Fusion"));
      expect(blocked.code).toBe("ON_COOLDOWN");
      expect(blocked.remainingCooldownSeconds).toBe(6);
      expect(blocked.message).toBe("You are on cooldown. Try again in 6.0s.");
      expect(await ownedCounts(h, PLAYER)).toEqual({ Eagle: 2, Phoenix: 1 });

      // A rejected attempt never moves the timestamp.
      expect(expectOk(await h.backend.cooldowns.getGlobal(PLAYER))).toEqual(T0);

      h.clock.advance(6);
      expect(expectOk(await h.service.craftDirect(PLAYER, "Fusion")).success).toBe(true);
    });

    it("applies the recipe cooldown on top of the global one", async () => {
      const slow = recipe({
        name: "Slow",
        cooldownSeconds: 60,
        ingredients: [{ itemKind: "Eagle", quantity: 1 }],
        result: { itemKind: "Owl", quantity: 1 },
      });
      const h = createHarness({ recipes: [FUSION, slow] });
      await grant(h, PLAYER, "Eagle", 5);

      expect(expectOk(await h.service.craftDirect(PLAYER, "Slow")).success).toBe(true);

      h.clock.advance(15);
      const blocked = expectOk(await h.service.craftDirect(PLAYER, "Slow"));
      expect(blocked.code).toBe("ON_COOLDOWN");
      expect(blocked.remainingCooldownSeconds).toBe(45);

      // Other recipes only wait for the global cooldown.
      expect(expectOk(await h.service.craftDirect(PLAYER, "Fusion")).success).toBe(true);
    });
  });

  describe("switches", () => {
    it("rejects everything while crafting is disabled", async () => {
      const h = createHarness({ settings: { enabled: false } });
      await grant(h, PLAYER, "Eagle", 2);

      const outcome = expectOk(await h.service.craftDirect(PLAYER, "Fusion"));
      expect(outcome.code).toBe("FEATURE_DISABLED");
      expect(outcome.message).toBe("Crafting is currently disabled.");
      expect(await auditOf(h)).toEqual([]);
    });

    it("rejects and audits a disabled recipe", async () => {
      const old = recipe({
        name: "Old",
        enabled: false,
        ingredients: [],
        result: { itemKind: "Dodo", quantity: 1 },
      });
      const h = createHarness({ recipes: [old] });

      const outcome = expectOk(await h.service.craftDirect(PLAYER, "old"));
      expect(outcome.code).toBe("FEATURE_DISABLED");
      expect(outcome.message).toBe('Recipe "Old" is disabled.');
      expect(await auditOf(h)).toHaveLength(1);
    });
  });

  describe("atomicity", () => {
    it("rolls back consumption when minting fails", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      const h = createHarness();
      await grant(h, PLAYER, "Eagle", 3);
      const service = createCraftingService({
        backend: failingMintBackend(h),
        now: h.clock.now,
      });

      const res = await service.craftDirect(PLAYER, "Fusion");

      expect(res.isErr()).toBe(true);
      expect(res.isErr() && res.error.message).toBe("disk full");
      expect(await ownedCounts(h, PLAYER)).toEqual({ Eagle: 3 });
      expect(expectOk(await h.backend.cooldowns.getGlobal(PLAYER))).toBeNull();

      const audit = await auditOf(h);
      expect(audit).toHaveLength(1);
      expect(audit[0]?.success).toBe(false);
      expect(audit[0]?.metadata.code).toBe("STORAGE_FAILURE");
    });

    it("never spends the same items twice", async () => {
      const h = createHarness({ settings: { globalCooldownSeconds: 0 } });
      await grant(h, PLAYER, "Eagle", 2);

      const [a, b] = await Promise.all([
        h.service.craftDirect(PLAYER, "Fusion"),
        h.service.craftDirect(PLAYER, "Fusion"),
      ]);
      const outcomes = [expectOk(a), expectOk(b)];

      expect(outcomes.filter((o) => o.success)).toHaveLength(1);
      const failed = outcomes.find((o) => !o.success);
      expect(failed?.code).toBe("INSUFFICIENT_INGREDIENTS");
      expect(failed?.shortfall).toEqual({ itemKind: "Eagle", required: 2, owned: 0 });
      expect(await ownedCounts(h, PLAYER)).toEqual({ Phoenix: 1 });
    });

    it("keeps a committed craft when the audit write fails", async () => {
      vi.spyOn(console, "error").mockImplementation(() => undefined);
      const h = createHarness();
      await grant(h, PLAYER, "Eagle", 2);
      const backend: CraftingBackend = {
        catalog: h.backend.catalog,
        unitOfWork: h.backend.unitOfWork,
        cooldowns: h.backend.cooldowns,
        sessions: h.backend.sessions,
        inventory: (ownerId) => h.backend.inventory(ownerId),
        audit: {
          append: async () => ErrResult(new Error("audit offline")),
          listByPlayer: (playerId, limit) => h.backend.audit.listByPlayer(playerId, limit),
        },
      };
      const service = createCraftingService({ backend, now: h.clock.now });

      const outcome = expectOk(await service.craftDirect(PLAYER, "Fusion"));

      expect(outcome.success).toBe(true);
      expect(await ownedCounts(h, PLAYER)).toEqual({ Phoenix: 1 });
      expect(await auditOf(h)).toEqual([]);
    });
  });
});

describe("listRecipes", () => {
  it("marks craftable recipes and lists what is missing", async () => {
    const owl = recipe({
      name: "Owlet",
      ingredients: [{ itemKind: "Hawk", quantity: 3 }],
      result: { itemKind: "Owl", quantity: 1 },
    });
    const h = createHarness({ recipes: [owl, FUSION] });
    await grant(h, PLAYER, "Eagle", 2);
    await grant(h, PLAYER, "Hawk", 1);

    const views = expectOk(await h.service.listRecipes(PLAYER));

    expect(views.map((v) => [v.recipe.name, v.craftable])).toEqual([
      ["Fusion", true],
      ["Owlet", false],
    ]);
    expect(views[1]?.missing).toEqual([{ itemKind: "Hawk", required: 3, owned: 1 }]);
  });
});
