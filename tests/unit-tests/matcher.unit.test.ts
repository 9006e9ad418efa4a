import { describe, expect, it } from "vitest";
import { defineRecipe } from "@/modules/crafting/catalog/schema";
import {
  countByKind,
  findCraftable,
  findShortfall,
  firstCraftable,
  listShortfalls,
  sumRequirements,
} from "@/modules/crafting/matcher";

const alpha = defineRecipe({
  name: "Alpha",
  ingredients: [
    { itemKind: "Eagle", quantity: 1 },
    { itemKind: "Hawk", quantity: 1 },
    { itemKind: "Eagle", quantity: 1 },
  ],
  result: { itemKind: "Griffin", quantity: 1 },
});

const beta = defineRecipe({
  name: "Beta",
  ingredients: [{ itemKind: "Eagle", quantity: 1 }],
  result: { itemKind: "Owl", quantity: 2 },
});

const retired = defineRecipe({
  name: "Retired",
  enabled: false,
  ingredients: [],
  result: { itemKind: "Dodo", quantity: 1 },
});

const free = defineRecipe({
  name: "Free",
  ingredients: [],
  result: { itemKind: "Sparrow", quantity: 1 },
});

describe("sumRequirements", () => {
  it("merges requirements of the same kind in first-appearance order", () => {
    expect(sumRequirements(alpha.ingredients)).toEqual([
      { itemKind: "Eagle", quantity: 2 },
      { itemKind: "Hawk", quantity: 1 },
    ]);
  });

  it("returns an empty list for a recipe without ingredients", () => {
    expect(sumRequirements([])).toEqual([]);
  });
});

describe("countByKind", () => {
  it("counts items per kind", () => {
    const counts = countByKind([
      { itemKind: "Eagle" },
      { itemKind: "Hawk" },
      { itemKind: "Eagle" },
    ]);
    expect(counts.get("Eagle")).toBe(2);
    expect(counts.get("Hawk")).toBe(1);
    expect(counts.get("Owl")).toBeUndefined();
  });
});

describe("findShortfall", () => {
  it("reports the summed requirement, not a single line", () => {
    const counts = new Map([
      ["Eagle", 1],
      ["Hawk", 1],
    ]);
    expect(findShortfall(alpha, counts)).toEqual({ itemKind: "Eagle", required: 2, owned: 1 });
  });

  it("reports the first unmet kind in recipe order", () => {
    expect(findShortfall(alpha, new Map())).toEqual({
      itemKind: "Eagle",
      required: 2,
      owned: 0,
    });
  });

  it("returns null when every requirement is covered", () => {
    const counts = new Map([
      ["Eagle", 2],
      ["Hawk", 1],
    ]);
    expect(findShortfall(alpha, counts)).toBeNull();
  });
});

describe("listShortfalls", () => {
  it("lists every uncovered requirement", () => {
    expect(listShortfalls(alpha, new Map([["Eagle", 5]]))).toEqual([
      { itemKind: "Hawk", required: 1, owned: 0 },
    ]);
  });
});

describe("findCraftable / firstCraftable", () => {
  const catalog = [alpha, beta, free, retired];

  it("keeps catalog order and skips disabled recipes", () => {
    const counts = new Map([
      ["Eagle", 2],
      ["Hawk", 1],
    ]);
    expect(findCraftable(counts, catalog).map((r) => r.name)).toEqual([
      "Alpha",
      "Beta",
      "Free",
    ]);
    expect(firstCraftable(counts, catalog)?.name).toBe("Alpha");
  });

  it("picks the first satisfiable recipe", () => {
    const counts = new Map([["Eagle", 1]]);
    expect(firstCraftable(counts, catalog)?.name).toBe("Beta");
  });

  it("treats a recipe without ingredients as always craftable", () => {
    expect(firstCraftable(new Map(), catalog)?.name).toBe("Free");
  });

  it("returns null when nothing is craftable", () => {
    expect(firstCraftable(new Map(), [alpha, beta, retired])).toBeNull();
  });

  it("gives the same answer for the same input", () => {
    const counts = new Map([["Eagle", 1]]);
    expect(findCraftable(counts, catalog)).toEqual(findCraftable(counts, catalog));
  });
});
