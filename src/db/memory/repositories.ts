/**
 * In-process repositories.
 *
 * Each repository reads and writes through a `StateAccess`: the locked live
 * state for standalone calls, or a transaction draft inside a unit of work.
 */
import type { ItemInstanceId, ItemKind, PlayerId, RecipeName } from "../types";
import { deepClone, toError } from "../helpers";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type {
  AuditSink,
  CraftAuditEntry,
  CreateCraftAuditInput,
} from "@/modules/crafting/audit/types";
import type { RecipeCooldownState } from "@/modules/crafting/cooldown/schema";
import type { CooldownRepository } from "@/modules/crafting/cooldown/repository";
import {
  consumeConflict,
  insufficientStock,
  type InventoryPort,
  type ItemRef,
  type MintOptions,
  type OwnedItemRecord,
} from "@/modules/crafting/inventory/port";
import type { AddItemOutcome, SessionRepository } from "@/modules/crafting/session/repository";
import type { CraftingSession } from "@/modules/crafting/session/schema";
import type { SessionItem } from "@/modules/crafting/types";
import {
  nextId,
  recipeStateKey,
  type MemoryState,
  type StateAccess,
  type StoredItem,
} from "./state";

async function attempt<T>(
  access: StateAccess,
  fn: (state: MemoryState) => Result<T, Error>,
): Promise<Result<T, Error>> {
  try {
    return await access.run(fn);
  } catch (error) {
    return ErrResult(toError(error));
  }
}

function available(state: MemoryState, ownerId: PlayerId, itemKind: ItemKind): StoredItem[] {
  const matches: StoredItem[] = [];
  for (const item of state.items.values()) {
    if (item.ownerId === ownerId && item.itemKind === itemKind && !item.withdrawn) {
      matches.push(item);
    }
  }
  // Map order is insertion order; the sort is stable.
  return matches.sort((a, b) => a.acquiredAt.getTime() - b.acquiredAt.getTime());
}

export class MemoryInventoryPort implements InventoryPort {
  constructor(
    public readonly ownerId: PlayerId,
    private readonly access: StateAccess,
  ) {}

  countAvailable(itemKind: ItemKind): Promise<Result<number, Error>> {
    return attempt(this.access, (state) =>
      OkResult(available(state, this.ownerId, itemKind).length),
    );
  }

  selectForConsumption(itemKind: ItemKind, quantity: number): Promise<Result<ItemRef[], Error>> {
    return attempt(this.access, (state) => {
      const items = available(state, this.ownerId, itemKind);
      if (items.length < quantity) {
        return ErrResult(insufficientStock(itemKind, quantity, items.length));
      }
      return OkResult(items.slice(0, quantity).map((item) => ({ id: item.id, itemKind })));
    });
  }

  consume(refs: readonly ItemRef[]): Promise<Result<void, Error>> {
    return attempt(this.access, (state) => {
      const ids = [...new Set(refs.map((ref) => ref.id))];
      const targets = ids
        .map((id) => state.items.get(id))
        .filter(
          (item): item is StoredItem =>
            item !== undefined && item.ownerId === this.ownerId && !item.withdrawn,
        );
      if (targets.length !== ids.length) {
        return ErrResult(consumeConflict(ids.length, targets.length));
      }

      const now = new Date();
      for (const item of targets) {
        item.withdrawn = true;
        item.withdrawnAt = now;
      }
      return OkResult(undefined);
    });
  }

  mint(
    itemKind: ItemKind,
    quantity: number,
    options: MintOptions = {},
  ): Promise<Result<ItemInstanceId[], Error>> {
    return attempt(this.access, (state) => {
      const acquiredAt = options.acquiredAt ?? new Date();
      const ids: ItemInstanceId[] = [];
      for (let i = 0; i < quantity; i++) {
        const id = nextId(state, "item");
        state.items.set(id, {
          id,
          ownerId: this.ownerId,
          itemKind,
          modifier: options.modifier ?? null,
          withdrawn: false,
          acquiredAt,
          withdrawnAt: null,
        });
        ids.push(id);
      }
      return OkResult(ids);
    });
  }

  getItems(ids: readonly ItemInstanceId[]): Promise<Result<OwnedItemRecord[], Error>> {
    return attempt(this.access, (state) => {
      const records: OwnedItemRecord[] = [];
      for (const id of new Set(ids)) {
        const item = state.items.get(id);
        if (item && item.ownerId === this.ownerId) records.push({ ...item });
      }
      return OkResult(records);
    });
  }
}

export class MemoryCooldownRepository implements CooldownRepository {
  constructor(private readonly access: StateAccess) {}

  getGlobal(playerId: PlayerId): Promise<Result<Date | null, Error>> {
    return attempt(this.access, (state) => OkResult(state.profiles.get(playerId) ?? null));
  }

  getRecipeState(
    playerId: PlayerId,
    recipeName: RecipeName,
  ): Promise<Result<RecipeCooldownState | null, Error>> {
    return attempt(this.access, (state) => {
      const row = state.recipeStates.get(recipeStateKey(playerId, recipeName));
      return OkResult(row ? { ...row } : null);
    });
  }

  touch(playerId: PlayerId, recipeName: RecipeName, at: Date): Promise<Result<void, Error>> {
    return attempt(this.access, (state) => {
      state.profiles.set(playerId, at);
      const key = recipeStateKey(playerId, recipeName);
      const row = state.recipeStates.get(key);
      if (row) {
        row.lastCraftedAt = at;
      } else {
        state.recipeStates.set(key, { playerId, recipeName, lastCraftedAt: at, autoEnabled: false });
      }
      return OkResult(undefined);
    });
  }

  setAutoEnabled(
    playerId: PlayerId,
    recipeName: RecipeName,
    enabled: boolean,
  ): Promise<Result<void, Error>> {
    return attempt(this.access, (state) => {
      const key = recipeStateKey(playerId, recipeName);
      const row = state.recipeStates.get(key);
      if (row) {
        row.autoEnabled = enabled;
      } else {
        state.recipeStates.set(key, {
          playerId,
          recipeName,
          lastCraftedAt: null,
          autoEnabled: enabled,
        });
      }
      return OkResult(undefined);
    });
  }

  clearAutoFlags(playerId: PlayerId): Promise<Result<void, Error>> {
    return attempt(this.access, (state) => {
      for (const row of state.recipeStates.values()) {
        if (row.playerId === playerId) row.autoEnabled = false;
      }
      return OkResult(undefined);
    });
  }
}

export class MemorySessionRepository implements SessionRepository {
  constructor(private readonly access: StateAccess) {}

  find(playerId: PlayerId): Promise<Result<CraftingSession | null, Error>> {
    return attempt(this.access, (state) => {
      const session = state.sessions.get(playerId);
      return OkResult(session ? deepClone(session) : null);
    });
  }

  create(
    playerId: PlayerId,
    createdAt: Date,
    expiresAt: Date,
  ): Promise<Result<CraftingSession, Error>> {
    return attempt(this.access, (state) => {
      const existing = state.sessions.get(playerId);
      if (existing) return OkResult(deepClone(existing));

      const session: CraftingSession = { playerId, createdAt, expiresAt, items: [] };
      state.sessions.set(playerId, session);
      return OkResult(deepClone(session));
    });
  }

  delete(playerId: PlayerId): Promise<Result<boolean, Error>> {
    return attempt(this.access, (state) => OkResult(state.sessions.delete(playerId)));
  }

  addItem(playerId: PlayerId, item: SessionItem): Promise<Result<AddItemOutcome, Error>> {
    return attempt(this.access, (state) => {
      const session = state.sessions.get(playerId);
      if (!session) return OkResult<AddItemOutcome>("missing_session");
      if (session.items.some((staged) => staged.itemId === item.itemId)) {
        return OkResult<AddItemOutcome>("duplicate");
      }
      state.sessions.set(playerId, { ...session, items: [...session.items, { ...item }] });
      return OkResult<AddItemOutcome>("added");
    });
  }

  removeItem(playerId: PlayerId, itemId: ItemInstanceId): Promise<Result<boolean, Error>> {
    return attempt(this.access, (state) => {
      const session = state.sessions.get(playerId);
      if (!session) return OkResult(false);
      const items = session.items.filter((staged) => staged.itemId !== itemId);
      if (items.length === session.items.length) return OkResult(false);
      state.sessions.set(playerId, { ...session, items });
      return OkResult(true);
    });
  }

  releaseItems(
    playerId: PlayerId,
    itemIds: readonly ItemInstanceId[],
  ): Promise<Result<void, Error>> {
    return attempt(this.access, (state) => {
      const session = state.sessions.get(playerId);
      if (!session) return OkResult(undefined);

      const released = new Set(itemIds);
      const items = session.items.filter((staged) => !released.has(staged.itemId));
      if (items.length === 0) {
        state.sessions.delete(playerId);
      } else {
        state.sessions.set(playerId, { ...session, items });
      }
      return OkResult(undefined);
    });
  }
}

export class MemoryAuditSink implements AuditSink {
  constructor(private readonly access: StateAccess) {}

  append(entry: CreateCraftAuditInput): Promise<Result<CraftAuditEntry, Error>> {
    return attempt(this.access, (state) => {
      const created: CraftAuditEntry = { id: `craft_${state.audit.length + 1}`, ...entry };
      state.audit.push(created);
      return OkResult(deepClone(created));
    });
  }

  listByPlayer(playerId: PlayerId, limit = 20): Promise<Result<CraftAuditEntry[], Error>> {
    return attempt(this.access, (state) =>
      OkResult(
        state.audit
          .filter((entry) => entry.playerId === playerId)
          .reverse()
          .slice(0, limit)
          .map((entry) => deepClone(entry)),
      ),
    );
  }
}
