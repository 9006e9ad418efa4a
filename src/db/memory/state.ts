/**
 * In-process database.
 *
 * Purpose: backend for tests and for running without MongoDB.
 *
 * Invariants:
 * - Every operation runs under one async lock, in arrival order.
 * - A transaction works on a structured clone of the state and swaps it in
 *   only when its work resolves; a rejection leaves the state untouched.
 */
import type { CraftAuditEntry } from "@/modules/crafting/audit/types";
import type { RecipeCooldownState } from "@/modules/crafting/cooldown/schema";
import type { OwnedItemRecord } from "@/modules/crafting/inventory/port";
import type { CraftingSession } from "@/modules/crafting/session/schema";
import type { ItemInstanceId, PlayerId, RecipeName } from "../types";
import { deepClone } from "../helpers";

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export type StoredItem = Mutable<OwnedItemRecord>;
export type StoredRecipeState = Mutable<RecipeCooldownState>;

export interface MemoryState {
  items: Map<ItemInstanceId, StoredItem>;
  /** Global cooldown timestamp per player. */
  profiles: Map<PlayerId, Date | null>;
  /** Keyed by `recipeStateKey`. */
  recipeStates: Map<string, StoredRecipeState>;
  sessions: Map<PlayerId, CraftingSession>;
  audit: CraftAuditEntry[];
  /** Id counter, kept in state so rolled-back mints do not burn ids. */
  sequence: number;
}

export const emptyState = (): MemoryState => ({
  items: new Map(),
  profiles: new Map(),
  recipeStates: new Map(),
  sessions: new Map(),
  audit: [],
  sequence: 0,
});

/** Runs a callback against a state: either the live one (locked) or a draft. */
export interface StateAccess {
  run<T>(fn: (state: MemoryState) => T): Promise<T>;
}

/** Map key for a (player, recipe) row; JSON keeps ids containing separators apart. */
export const recipeStateKey = (playerId: PlayerId, recipeName: RecipeName): string =>
  JSON.stringify([playerId, recipeName]);

export function nextId(state: MemoryState, prefix: string): string {
  state.sequence += 1;
  return `${prefix}_${state.sequence.toString(36).padStart(6, "0")}`;
}

export class MemoryDatabase {
  private state: MemoryState = emptyState();
  private tail: Promise<void> = Promise.resolve();

  /** Lock-guarded access to the live state. */
  readonly live: StateAccess = {
    run: <T>(fn: (state: MemoryState) => T): Promise<T> =>
      this.exclusive(() => fn(this.state)),
  };

  /** Serializes `fn` behind every operation queued before it. */
  exclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  transaction<T>(work: (draft: StateAccess) => Promise<T>): Promise<T> {
    return this.exclusive(async (): Promise<T> => {
      const draft = deepClone(this.state);
      const value = await work({
        run: async <R>(fn: (state: MemoryState) => R): Promise<R> => fn(draft),
      });
      this.state = draft;
      return value;
    });
  }

  /** Deep copy of the live state, for assertions. */
  snapshot(): Promise<MemoryState> {
    return this.live.run((state) => deepClone(state));
  }
}
