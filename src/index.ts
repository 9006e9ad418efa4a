/**
 * Package entrypoint.
 *
 * Re-exports the crafting module, configuration and both backends, plus
 * `createCraftingService` to wire a service from a backend and a settings
 * source.
 */
import {
  SettingsStore,
  StaticSettingsProvider,
  type SettingsProvider,
} from "@/configuration";
import { CraftingService, type CraftingBackend, type Sleep } from "@/modules/crafting";

export * from "@/modules/crafting";
export * from "@/configuration";
export { type Result, OkResult, ErrResult, unwrapOrThrow } from "@/utils/result";
export { createMongoBackend } from "@/db/mongo-backend";
export { ensureCraftingIndexes } from "@/db/indexes";
export { disconnectDb, getDb, getMongoClient } from "@/db/mongo";
export { createMemoryBackend, MemoryBackend, MemoryUnitOfWork } from "@/db/memory/backend";
export { MemoryDatabase } from "@/db/memory/state";

export interface CreateCraftingServiceOptions {
  readonly backend: CraftingBackend;
  /** Defaults to the built-in settings defaults. */
  readonly settings?: SettingsProvider;
  readonly settingsTtlMs?: number;
  readonly now?: () => Date;
  readonly autoCraftDelayMs?: number;
  readonly sleep?: Sleep;
}

export function createCraftingService(options: CreateCraftingServiceOptions): CraftingService {
  const provider = options.settings ?? new StaticSettingsProvider();
  return new CraftingService({
    backend: options.backend,
    settings: new SettingsStore(provider, options.settingsTtlMs),
    now: options.now,
    autoCraftDelayMs: options.autoCraftDelayMs,
    sleep: options.sleep,
  });
}
