/**
 * Session Store.
 *
 * Purpose: staging sessions as seen by the service; lazy expiry, duplicate
 * detection and craftable previews.
 *
 * Invariants:
 * - At most one active session per player; an expired one is deleted on the
 *   next access and treated as absent.
 * - Staging never reserves items. Previews only count staged items that are
 *   still owned and unconsumed.
 */
import type { CraftingSettings } from "@/configuration/definitions";
import type { ItemInstanceId, ItemKind, PlayerId } from "@/db/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { RecipeCatalog } from "../catalog/repository";
import type { InventoryPort } from "../inventory/port";
import { countByKind, findCraftable } from "../matcher";
import { craftingErrors } from "../messages";
import type { Recipe, SessionItem, SessionView } from "../types";
import type { SessionRepository } from "./repository";
import { isExpired, type CraftingSession } from "./schema";

export interface SessionStoreDeps {
  readonly repo: SessionRepository;
  readonly catalog: RecipeCatalog;
  readonly inventory: (ownerId: PlayerId) => InventoryPort;
  readonly now?: () => Date;
}

export class SessionStore {
  private readonly repo: SessionRepository;
  private readonly catalog: RecipeCatalog;
  private readonly inventory: (ownerId: PlayerId) => InventoryPort;
  private readonly now: () => Date;

  constructor(deps: SessionStoreDeps) {
    this.repo = deps.repo;
    this.catalog = deps.catalog;
    this.inventory = deps.inventory;
    this.now = deps.now ?? (() => new Date());
  }

  async getActive(playerId: PlayerId): Promise<Result<CraftingSession | null, Error>> {
    const found = await this.repo.find(playerId);
    if (found.isErr()) return found;

    const session = found.value;
    if (!session) return OkResult(null);

    if (isExpired(session, this.now())) {
      const removed = await this.repo.delete(playerId);
      if (removed.isErr()) return ErrResult(removed.error);
      return OkResult(null);
    }
    return OkResult(session);
  }

  async getOrCreate(
    playerId: PlayerId,
    settings: CraftingSettings,
  ): Promise<Result<CraftingSession, Error>> {
    const active = await this.getActive(playerId);
    if (active.isErr()) return ErrResult(active.error);
    if (active.value) return OkResult(active.value);

    const createdAt = this.now();
    const expiresAt = new Date(
      createdAt.getTime() + settings.sessionTimeoutMinutes * 60_000,
    );
    return this.repo.create(playerId, createdAt, expiresAt);
  }

  /**
   * Stages an item reference.
   *
   * Errors: `ALREADY_STAGED` for a duplicate, `NO_SESSION_ACTIVE` if the
   * session disappeared in between.
   */
  async addItem(
    session: CraftingSession,
    item: { readonly itemId: ItemInstanceId; readonly itemKind: ItemKind },
  ): Promise<Result<SessionItem, Error>> {
    const staged: SessionItem = { ...item, stagedAt: this.now() };
    const res = await this.repo.addItem(session.playerId, staged);
    if (res.isErr()) return ErrResult(res.error);

    switch (res.value) {
      case "added":
        return OkResult(staged);
      case "duplicate":
        return ErrResult(craftingErrors.alreadyStaged(item.itemId, item.itemKind));
      case "missing_session":
        return ErrResult(craftingErrors.noSession());
    }
  }

  removeItem(
    session: CraftingSession,
    itemId: ItemInstanceId,
  ): Promise<Result<boolean, Error>> {
    return this.repo.removeItem(session.playerId, itemId);
  }

  async clear(session: CraftingSession): Promise<Result<void, Error>> {
    const res = await this.repo.delete(session.playerId);
    return res.map(() => undefined);
  }

  /** Staged items that are still owned and unconsumed, in staging order. */
  async validItems(playerId: PlayerId): Promise<Result<SessionItem[], Error>> {
    const fresh = await this.getActive(playerId);
    if (fresh.isErr()) return ErrResult(fresh.error);
    if (!fresh.value) return OkResult([]);

    const staged = fresh.value.items;
    const owned = await this.inventory(playerId).getItems(staged.map((i) => i.itemId));
    if (owned.isErr()) return ErrResult(owned.error);

    const available = new Set(
      owned.value.filter((record) => !record.withdrawn).map((record) => record.id),
    );
    return OkResult(staged.filter((item) => available.has(item.itemId)));
  }

  /** Enabled recipes the session's current contents satisfy, in catalog order. */
  async computeCraftable(session: CraftingSession): Promise<Result<Recipe[], Error>> {
    const items = await this.validItems(session.playerId);
    if (items.isErr()) return ErrResult(items.error);

    const recipes = await this.catalog.listEnabledRecipes();
    if (recipes.isErr()) return ErrResult(recipes.error);

    return OkResult(findCraftable(countByKind(items.value), recipes.value));
  }

  async describe(session: CraftingSession): Promise<Result<SessionView, Error>> {
    const fresh = await this.getActive(session.playerId);
    if (fresh.isErr()) return ErrResult(fresh.error);
    const current = fresh.value ?? session;

    const craftable = await this.computeCraftable(current);
    if (craftable.isErr()) return ErrResult(craftable.error);

    const counts: Record<ItemKind, number> = {};
    for (const [kind, count] of countByKind(current.items)) counts[kind] = count;

    const remainingMs = current.expiresAt.getTime() - this.now().getTime();
    return OkResult({
      playerId: current.playerId,
      items: current.items,
      counts,
      craftable: craftable.value,
      expiresAt: current.expiresAt,
      expiresInSeconds: Math.max(0, Math.floor(remainingMs / 1000)),
    });
  }
}
