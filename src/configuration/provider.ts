/**
 * Settings providers.
 *
 * Purpose: read the crafting settings slice without exposing persistence
 * details to the engine.
 */
import type { Collection } from "mongodb";
import { z } from "zod";
import { getDb } from "@/db/mongo";
import { toError } from "@/db/helpers";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { parseCraftingSettings, type CraftingSettings } from "./definitions";

export interface SettingsProvider {
  load(): Promise<Result<CraftingSettings, Error>>;
}

export const SETTINGS_COLLECTION = "crafting_settings";
/** The settings document is a singleton keyed by this id. */
export const SETTINGS_DOCUMENT_ID = "global";

const SettingsDocSchema = z
  .object({
    _id: z.string(),
  })
  .passthrough();

type SettingsDoc = z.infer<typeof SettingsDocSchema>;

/**
 * MongoDB implementation backed by the singleton settings document.
 * A missing document yields the defaults and is created on first read.
 */
export class MongoSettingsProvider implements SettingsProvider {
  private async collection(): Promise<Collection<SettingsDoc>> {
    return (await getDb()).collection<SettingsDoc>(SETTINGS_COLLECTION);
  }

  async load(): Promise<Result<CraftingSettings, Error>> {
    try {
      const col = await this.collection();
      const doc = await col.findOneAndUpdate(
        { _id: SETTINGS_DOCUMENT_ID },
        { $setOnInsert: { _id: SETTINGS_DOCUMENT_ID } },
        { upsert: true, returnDocument: "after" },
      );
      return OkResult(parseCraftingSettings(doc));
    } catch (error) {
      console.error("[SettingsProvider] Failed to load crafting settings:", error);
      return ErrResult(toError(error));
    }
  }
}

/** Fixed settings, used by the memory backend and by tests. */
export class StaticSettingsProvider implements SettingsProvider {
  private settings: CraftingSettings;

  constructor(initial: Partial<CraftingSettings> = {}) {
    this.settings = parseCraftingSettings(initial);
  }

  /** Replace the served value (admin surface stand-in). */
  update(patch: Partial<CraftingSettings>): void {
    this.settings = parseCraftingSettings({ ...this.settings, ...patch });
  }

  async load(): Promise<Result<CraftingSettings, Error>> {
    return OkResult(this.settings);
  }
}
