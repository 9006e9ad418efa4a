/**
 * Session repository.
 *
 * Storage for staging sessions. Expiry is not enforced here; `SessionStore`
 * checks it on access.
 */
import type { ClientSession, Collection } from "mongodb";
import type { ItemInstanceId, PlayerId } from "@/db/types";
import { getDb } from "@/db/mongo";
import { parseDocument, toError } from "@/db/helpers";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import type { SessionItem } from "../types";
import {
  SESSIONS_COLLECTION,
  SessionDocSchema,
  toCraftingSession,
  type CraftingSession,
  type SessionDoc,
} from "./schema";

export type AddItemOutcome = "added" | "duplicate" | "missing_session";

export interface SessionRepository {
  find(playerId: PlayerId): Promise<Result<CraftingSession | null, Error>>;
  /** Creates the session unless one exists; returns the stored one. */
  create(
    playerId: PlayerId,
    createdAt: Date,
    expiresAt: Date,
  ): Promise<Result<CraftingSession, Error>>;
  delete(playerId: PlayerId): Promise<Result<boolean, Error>>;
  addItem(playerId: PlayerId, item: SessionItem): Promise<Result<AddItemOutcome, Error>>;
  /** False when the item was not staged. */
  removeItem(playerId: PlayerId, itemId: ItemInstanceId): Promise<Result<boolean, Error>>;
  /** Drops the given staged rows; deletes the session if none remain. */
  releaseItems(
    playerId: PlayerId,
    itemIds: readonly ItemInstanceId[],
  ): Promise<Result<void, Error>>;
}

async function sessionsCollection(): Promise<Collection<SessionDoc>> {
  return (await getDb()).collection<SessionDoc>(SESSIONS_COLLECTION);
}

function parseSession(doc: unknown): CraftingSession | null {
  const parsed = parseDocument(SessionDocSchema, doc, "SessionRepository");
  return parsed ? toCraftingSession(parsed) : null;
}

export class MongoSessionRepository implements SessionRepository {
  constructor(private readonly session?: ClientSession) {}

  async find(playerId: PlayerId): Promise<Result<CraftingSession | null, Error>> {
    try {
      const col = await sessionsCollection();
      const doc = await col.findOne({ _id: playerId }, { session: this.session });
      return OkResult(doc ? parseSession(doc) : null);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async create(
    playerId: PlayerId,
    createdAt: Date,
    expiresAt: Date,
  ): Promise<Result<CraftingSession, Error>> {
    try {
      const col = await sessionsCollection();
      const doc = await col.findOneAndUpdate(
        { _id: playerId },
        { $setOnInsert: { createdAt, expiresAt, items: [] } },
        { upsert: true, returnDocument: "after", session: this.session },
      );
      const session = doc ? parseSession(doc) : null;
      if (!session) {
        return ErrResult(new Error(`Session for ${playerId} could not be created`));
      }
      return OkResult(session);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async delete(playerId: PlayerId): Promise<Result<boolean, Error>> {
    try {
      const col = await sessionsCollection();
      const res = await col.deleteOne({ _id: playerId }, { session: this.session });
      return OkResult(res.deletedCount > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async addItem(
    playerId: PlayerId,
    item: SessionItem,
  ): Promise<Result<AddItemOutcome, Error>> {
    try {
      const col = await sessionsCollection();
      const res = await col.updateOne(
        { _id: playerId, "items.itemId": { $ne: item.itemId } },
        { $push: { items: item } },
        { session: this.session },
      );
      if (res.modifiedCount > 0) return OkResult("added");

      const exists = await col.countDocuments({ _id: playerId }, { session: this.session });
      return OkResult(exists > 0 ? "duplicate" : "missing_session");
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async removeItem(
    playerId: PlayerId,
    itemId: ItemInstanceId,
  ): Promise<Result<boolean, Error>> {
    try {
      const col = await sessionsCollection();
      const res = await col.updateOne(
        { _id: playerId },
        { $pull: { items: { itemId } } },
        { session: this.session },
      );
      return OkResult(res.modifiedCount > 0);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }

  async releaseItems(
    playerId: PlayerId,
    itemIds: readonly ItemInstanceId[],
  ): Promise<Result<void, Error>> {
    try {
      const col = await sessionsCollection();
      await col.updateOne(
        { _id: playerId },
        { $pull: { items: { itemId: { $in: [...itemIds] } } } },
        { session: this.session },
      );
      await col.deleteOne({ _id: playerId, items: { $size: 0 } }, { session: this.session });
      return OkResult(undefined);
    } catch (error) {
      return ErrResult(toError(error));
    }
  }
}
