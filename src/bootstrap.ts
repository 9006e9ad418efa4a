/**
 * Startup wiring.
 *
 * Picks the backend from `CRAFTING_BACKEND`, ensures indexes for Mongo and
 * returns the service plus a `close` hook for shutdown.
 */
import {
  MongoSettingsProvider,
  readEnv,
  StaticSettingsProvider,
  type CraftingEnv,
} from "@/configuration";
import { createMemoryBackend } from "@/db/memory/backend";
import { createMongoBackend } from "@/db/mongo-backend";
import { ensureCraftingIndexes } from "@/db/indexes";
import { disconnectDb, getDb } from "@/db/mongo";
import type { CraftingService } from "@/modules/crafting";
import { createCraftingService } from "./index";

export interface RunningCraftingService {
  readonly service: CraftingService;
  close(): Promise<void>;
}

export async function startCraftingService(
  env: CraftingEnv = readEnv(),
): Promise<RunningCraftingService> {
  if (env.CRAFTING_BACKEND === "memory") {
    console.log("[Bootstrap] Using in-process crafting backend");
    const service = createCraftingService({
      backend: createMemoryBackend(),
      settings: new StaticSettingsProvider(),
    });
    return { service, close: async () => undefined };
  }

  await getDb(env);
  console.log(`[Bootstrap] Connected to MongoDB (${env.DB_NAME})`);
  await ensureCraftingIndexes();

  const service = createCraftingService({
    backend: createMongoBackend(),
    settings: new MongoSettingsProvider(),
  });
  return { service, close: () => disconnectDb() };
}
