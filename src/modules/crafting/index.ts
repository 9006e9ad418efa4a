/**
 * Crafting Module.
 *
 * Purpose: recipe matching, cooldown gating, atomic crafts, staging sessions
 * and auto-craft loops.
 */

export * from "./types";
export * from "./matcher";
export * from "./messages";
export { classifyFailure, CraftingEngine, type CraftingEngineDeps } from "./engine";
export {
  AUTO_CRAFT_DELAY_MS,
  AutoCraftLoop,
  type AutoCraftLoopDeps,
  type AutoCraftRunInput,
  type Sleep,
} from "./auto-craft";
export {
  TransactionConflictError,
  type CraftingBackend,
  type TransactionScope,
  type UnitOfWork,
} from "./backend";
export { AUTO_CRAFT_OFF, CraftingService, type CraftingServiceDeps } from "./service";
export {
  MongoRecipeCatalog,
  StaticRecipeCatalog,
  type RecipeCatalog,
} from "./catalog/repository";
export { defineRecipe, RecipeSchema, type RecipeInput } from "./catalog/schema";
export {
  InventoryError,
  type InventoryErrorCode,
  type InventoryPort,
  type ItemRef,
  type MintOptions,
  type OwnedItemRecord,
} from "./inventory/port";
export { MongoInventoryPort } from "./inventory/repository";
export {
  computeCooldown,
  CooldownTracker,
  type CooldownSnapshot,
  type CooldownStatus,
} from "./cooldown/tracker";
export { MongoCooldownRepository, type CooldownRepository } from "./cooldown/repository";
export type { RecipeCooldownState } from "./cooldown/schema";
export { SessionStore, type SessionStoreDeps } from "./session/store";
export {
  MongoSessionRepository,
  type AddItemOutcome,
  type SessionRepository,
} from "./session/repository";
export { isExpired, type CraftingSession } from "./session/schema";
export { MongoAuditSink } from "./audit/repository";
export type {
  AuditSink,
  CraftAuditEntry,
  CraftAuditMetadata,
  CreateCraftAuditInput,
} from "./audit/types";
