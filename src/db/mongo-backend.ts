import { MongoAuditSink } from "@/modules/crafting/audit/repository";
import type { CraftingBackend } from "@/modules/crafting/backend";
import { MongoRecipeCatalog } from "@/modules/crafting/catalog/repository";
import { MongoCooldownRepository } from "@/modules/crafting/cooldown/repository";
import { MongoInventoryPort } from "@/modules/crafting/inventory/repository";
import { MongoSessionRepository } from "@/modules/crafting/session/repository";
import { MongoUnitOfWork } from "./transaction";

/** Crafting backend over the shared Mongo client (`getDb`). */
export function createMongoBackend(): CraftingBackend {
  return {
    catalog: new MongoRecipeCatalog(),
    unitOfWork: new MongoUnitOfWork(),
    cooldowns: new MongoCooldownRepository(),
    sessions: new MongoSessionRepository(),
    audit: new MongoAuditSink(),
    inventory: (ownerId) => new MongoInventoryPort(ownerId),
  };
}
