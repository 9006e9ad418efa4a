/**
 * Storage seams of the crafting core.
 *
 * The engine, session store and auto loop only see these interfaces. Two
 * backends implement them: MongoDB (`@/db/mongo-backend`) and the in-process
 * database (`@/db/memory/backend`).
 */
import type { PlayerId } from "@/db/types";
import type { AuditSink } from "./audit/types";
import type { RecipeCatalog } from "./catalog/repository";
import type { CooldownRepository } from "./cooldown/repository";
import type { InventoryPort } from "./inventory/port";
import type { SessionRepository } from "./session/repository";

/**
 * Repositories bound to one unit of work. Reads see the unit's own writes;
 * nothing is visible to others until it commits.
 */
export interface TransactionScope {
  inventory(ownerId: PlayerId): InventoryPort;
  readonly cooldowns: CooldownRepository;
  readonly sessions: SessionRepository;
}

export interface UnitOfWork {
  /**
   * Runs `work` atomically. A throw (or rejected promise) rolls back every
   * write made through the scope and is rethrown to the caller.
   */
  run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T>;
}

export interface CraftingBackend {
  readonly catalog: RecipeCatalog;
  readonly unitOfWork: UnitOfWork;
  readonly cooldowns: CooldownRepository;
  readonly sessions: SessionRepository;
  readonly audit: AuditSink;
  /** Non-transactional port, for reads and staging checks. */
  inventory(ownerId: PlayerId): InventoryPort;
}

/**
 * Raised by a unit of work when it could not commit because of concurrent
 * writers, after any retries the backend performs.
 */
export class TransactionConflictError extends Error {
  constructor(message = "Concurrent update conflict", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransactionConflictError";
  }
}
