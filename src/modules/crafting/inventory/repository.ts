/**
 * Mongo-backed Inventory Port.
 *
 * Purpose: count, select, consume and mint owned items in the `ball_instances`
 * collection.
 * Context: when constructed with a `ClientSession`, every read and write joins
 * that transaction; the engine relies on this for its single unit of work.
 *
 * Invariants:
 * - `consume` filters on `withdrawn: false`, so two transactions racing for the
 *   same documents conflict instead of both succeeding.
 */
import type { ClientSession, Collection } from "mongodb";
import type { ItemInstanceId, ItemKind, PlayerId } from "@/db/types";
import { getDb } from "@/db/mongo";
import { parseDocument, toError } from "@/db/helpers";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import {
  consumeConflict,
  insufficientStock,
  type InventoryPort,
  type ItemRef,
  type MintOptions,
  type OwnedItemRecord,
} from "./port";
import {
  generateItemId,
  ITEMS_COLLECTION,
  OwnedItemDocSchema,
  toOwnedItemRecord,
  type OwnedItemDoc,
} from "./schema";

export async function itemsCollection(): Promise<Collection<OwnedItemDoc>> {
  return (await getDb()).collection<OwnedItemDoc>(ITEMS_COLLECTION);
}

export class MongoInventoryPort implements InventoryPort {
  constructor(
    public readonly ownerId: PlayerId,
    private readonly session?: ClientSession,
  ) {}

  async countAvailable(itemKind: ItemKind): Promise<Result<number, Error>> {
    try {
      const col = await itemsCollection();
      const count = await col.countDocuments(
        { ownerId: this.ownerId, itemKind, withdrawn: false },
        { session: this.session },
      );
      return OkResult(count);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async selectForConsumption(
    itemKind: ItemKind,
    quantity: number,
  ): Promise<Result<ItemRef[], Error>> {
    try {
      const col = await itemsCollection();
      const docs = await col
        .find(
          { ownerId: this.ownerId, itemKind, withdrawn: false },
          { session: this.session },
        )
        .sort({ acquiredAt: 1, _id: 1 })
        .limit(quantity)
        .project<{ _id: string }>({ _id: 1 })
        .toArray();

      if (docs.length < quantity) {
        return ErrResult(insufficientStock(itemKind, quantity, docs.length));
      }
      return OkResult(docs.map((doc) => ({ id: doc._id, itemKind })));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async consume(refs: readonly ItemRef[]): Promise<Result<void, Error>> {
    if (refs.length === 0) return OkResult(undefined);

    try {
      const col = await itemsCollection();
      const ids = refs.map((ref) => ref.id);
      const res = await col.updateMany(
        { _id: { $in: ids }, ownerId: this.ownerId, withdrawn: false },
        { $set: { withdrawn: true, withdrawnAt: new Date() } },
        { session: this.session },
      );

      // RISK: outside a transaction a partial match has already been written;
      // the engine only calls `consume` with a bound session.
      if (res.modifiedCount !== new Set(ids).size) {
        return ErrResult(consumeConflict(ids.length, res.modifiedCount));
      }
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async mint(
    itemKind: ItemKind,
    quantity: number,
    options: MintOptions = {},
  ): Promise<Result<ItemInstanceId[], Error>> {
    if (quantity <= 0) return OkResult([]);

    try {
      const col = await itemsCollection();
      const acquiredAt = options.acquiredAt ?? new Date();
      const docs: OwnedItemDoc[] = Array.from({ length: quantity }, () => ({
        _id: generateItemId(),
        ownerId: this.ownerId,
        itemKind,
        modifier: options.modifier ?? null,
        withdrawn: false,
        acquiredAt,
        withdrawnAt: null,
      }));
      await col.insertMany(docs, { session: this.session });
      return OkResult(docs.map((doc) => doc._id));
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async getItems(
    ids: readonly ItemInstanceId[],
  ): Promise<Result<OwnedItemRecord[], Error>> {
    if (ids.length === 0) return OkResult([]);

    try {
      const col = await itemsCollection();
      const docs = await col
        .find({ _id: { $in: [...ids] }, ownerId: this.ownerId }, { session: this.session })
        .toArray();

      const records: OwnedItemRecord[] = [];
      for (const doc of docs) {
        const parsed = parseDocument(OwnedItemDocSchema, doc, "InventoryPort");
        if (parsed) records.push(toOwnedItemRecord(parsed));
      }
      return OkResult(records);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}
