/**
 * In-process crafting backend.
 *
 * Wires the memory repositories to one `MemoryDatabase`. Used by the test
 * suites and when `CRAFTING_BACKEND=memory`.
 */
import type { CraftingBackend, TransactionScope, UnitOfWork } from "@/modules/crafting/backend";
import { StaticRecipeCatalog, type RecipeCatalog } from "@/modules/crafting/catalog/repository";
import type { MintOptions } from "@/modules/crafting/inventory/port";
import type { Recipe } from "@/modules/crafting/types";
import type { Result } from "@/utils/result";
import type { ItemInstanceId, ItemKind, PlayerId } from "../types";
import {
  MemoryAuditSink,
  MemoryCooldownRepository,
  MemoryInventoryPort,
  MemorySessionRepository,
} from "./repositories";
import { MemoryDatabase, type StateAccess } from "./state";

export function createMemoryScope(access: StateAccess): TransactionScope {
  return {
    inventory: (ownerId) => new MemoryInventoryPort(ownerId, access),
    cooldowns: new MemoryCooldownRepository(access),
    sessions: new MemorySessionRepository(access),
  };
}

export class MemoryUnitOfWork implements UnitOfWork {
  constructor(private readonly db: MemoryDatabase) {}

  run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    return this.db.transaction((draft) => work(createMemoryScope(draft)));
  }
}

export class MemoryBackend implements CraftingBackend {
  readonly catalog: RecipeCatalog;
  readonly unitOfWork: UnitOfWork;
  readonly cooldowns: MemoryCooldownRepository;
  readonly sessions: MemorySessionRepository;
  readonly audit: MemoryAuditSink;

  constructor(
    readonly db: MemoryDatabase,
    catalog: RecipeCatalog,
  ) {
    this.catalog = catalog;
    this.unitOfWork = new MemoryUnitOfWork(db);
    this.cooldowns = new MemoryCooldownRepository(db.live);
    this.sessions = new MemorySessionRepository(db.live);
    this.audit = new MemoryAuditSink(db.live);
  }

  inventory(ownerId: PlayerId): MemoryInventoryPort {
    return new MemoryInventoryPort(ownerId, this.db.live);
  }

  /** Gives `count` new items of a kind to a player (catches, trades, ...). */
  grantItems(
    ownerId: PlayerId,
    itemKind: ItemKind,
    count: number,
    options: MintOptions = {},
  ): Promise<Result<ItemInstanceId[], Error>> {
    return this.inventory(ownerId).mint(itemKind, count, options);
  }
}

export function createMemoryBackend(recipes: readonly Recipe[] = []): MemoryBackend {
  return new MemoryBackend(new MemoryDatabase(), new StaticRecipeCatalog(recipes));
}
