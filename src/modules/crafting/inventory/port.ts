/**
 * Inventory Port.
 *
 * Purpose: the only way the crafting core touches owned items. Every port is
 * scoped to one owner.
 *
 * Invariants:
 * - `selectForConsumption` is FIFO: oldest `acquiredAt` first, ties by id.
 * - `consume` is all-or-nothing: either every reference flips to withdrawn or
 *   none does.
 * - Implementations bound to a unit of work see and write that unit's state.
 */
import type { ItemInstanceId, ItemKind, PlayerId } from "@/db/types";
import type { Result } from "@/utils/result";

/** One discrete owned unit (e.g. one caught ball). */
export interface OwnedItemRecord {
  readonly id: ItemInstanceId;
  readonly ownerId: PlayerId;
  readonly itemKind: ItemKind;
  readonly modifier: string | null;
  readonly withdrawn: boolean;
  readonly acquiredAt: Date;
  readonly withdrawnAt: Date | null;
}

/** Reference to an item selected for consumption. */
export interface ItemRef {
  readonly id: ItemInstanceId;
  readonly itemKind: ItemKind;
}

export type InventoryErrorCode = "INSUFFICIENT_STOCK" | "CONSUME_CONFLICT";

export class InventoryError extends Error {
  constructor(
    public readonly code: InventoryErrorCode,
    message: string,
    public readonly stock?: {
      readonly itemKind: ItemKind;
      readonly required: number;
      readonly available: number;
    },
  ) {
    super(message);
    this.name = "InventoryError";
  }
}

export interface MintOptions {
  readonly modifier?: string;
  /** Acquisition time of the new items; defaults to now. */
  readonly acquiredAt?: Date;
}

export interface InventoryPort {
  readonly ownerId: PlayerId;

  /** Count of the owner's unconsumed items of a kind. */
  countAvailable(itemKind: ItemKind): Promise<Result<number, Error>>;

  /** Oldest-first references; `INSUFFICIENT_STOCK` when fewer are available. */
  selectForConsumption(
    itemKind: ItemKind,
    quantity: number,
  ): Promise<Result<ItemRef[], Error>>;

  /** Marks the items withdrawn; `CONSUME_CONFLICT` if any is not consumable. */
  consume(refs: readonly ItemRef[]): Promise<Result<void, Error>>;

  /** Creates `quantity` new items for the owner and returns their ids. */
  mint(
    itemKind: ItemKind,
    quantity: number,
    options?: MintOptions,
  ): Promise<Result<ItemInstanceId[], Error>>;

  /** Looks up items of this owner by id, withdrawn ones included. */
  getItems(ids: readonly ItemInstanceId[]): Promise<Result<OwnedItemRecord[], Error>>;
}

export const insufficientStock = (
  itemKind: ItemKind,
  required: number,
  available: number,
): InventoryError =>
  new InventoryError(
    "INSUFFICIENT_STOCK",
    `Need ${required} × ${itemKind}, only ${available} available.`,
    { itemKind, required, available },
  );

export const consumeConflict = (expected: number, consumed: number): InventoryError =>
  new InventoryError(
    "CONSUME_CONFLICT",
    `Expected to consume ${expected} item(s) but ${consumed} were available.`,
  );
