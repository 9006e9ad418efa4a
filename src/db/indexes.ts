import { auditCollection } from "@/modules/crafting/audit/repository";
import { RECIPE_NAME_COLLATION, recipesCollection } from "@/modules/crafting/catalog/repository";
import { RECIPE_STATES_COLLECTION } from "@/modules/crafting/cooldown/schema";
import { itemsCollection } from "@/modules/crafting/inventory/repository";
import { getDb } from "./mongo";

/**
 * Ensure indexes used by the crafting queries.
 * Should be called once at application startup.
 */
export async function ensureCraftingIndexes(): Promise<void> {
  try {
    const items = await itemsCollection();
    // FIFO selection of an owner's unconsumed items of one kind.
    await items.createIndex(
      { ownerId: 1, itemKind: 1, withdrawn: 1, acquiredAt: 1, _id: 1 },
      { name: "owner_kind_fifo_idx" },
    );

    const recipes = await recipesCollection();
    await recipes.createIndex(
      { name: 1 },
      { name: "recipe_name_ci_idx", unique: true, collation: RECIPE_NAME_COLLATION },
    );

    const db = await getDb();
    await db
      .collection(RECIPE_STATES_COLLECTION)
      .createIndex({ playerId: 1, autoEnabled: 1 }, { name: "player_auto_idx" });

    const logs = await auditCollection();
    await logs.createIndex({ playerId: 1, timestamp: -1 }, { name: "player_time_idx" });

    console.log("[CraftingIndexes] Indexes ensured");
  } catch (error) {
    console.error("[CraftingIndexes] Failed to ensure indexes:", error);
  }
}
