/**
 * Mongo unit of work.
 *
 * Purpose: run a crafting commit inside one `ClientSession` transaction with
 * every repository bound to that session.
 *
 * Gotchas:
 * - `withTransaction` retries the whole callback on transient errors, so the
 *   callback must re-read everything it decides on (the engine does).
 * - Conflicts still failing after the driver's retries surface as
 *   `TransactionConflictError`.
 */
import { MongoError, type ClientSession } from "mongodb";
import {
  TransactionConflictError,
  type TransactionScope,
  type UnitOfWork,
} from "@/modules/crafting/backend";
import { MongoCooldownRepository } from "@/modules/crafting/cooldown/repository";
import { MongoInventoryPort } from "@/modules/crafting/inventory/repository";
import { MongoSessionRepository } from "@/modules/crafting/session/repository";
import { getMongoClient } from "./mongo";

const WRITE_CONFLICT_CODE = 112;

export function isTransientConflict(error: unknown): boolean {
  if (!(error instanceof MongoError)) return false;
  return (
    error.hasErrorLabel("TransientTransactionError") ||
    error.code === WRITE_CONFLICT_CODE
  );
}

export function createSessionScope(session: ClientSession): TransactionScope {
  return {
    inventory: (ownerId) => new MongoInventoryPort(ownerId, session),
    cooldowns: new MongoCooldownRepository(session),
    sessions: new MongoSessionRepository(session),
  };
}

export class MongoUnitOfWork implements UnitOfWork {
  async run<T>(work: (scope: TransactionScope) => Promise<T>): Promise<T> {
    const client = await getMongoClient();
    const session = client.startSession();
    try {
      const box: { current?: { value: Awaited<T> } } = {};
      await session.withTransaction(async () => {
        box.current = { value: await work(createSessionScope(session)) };
      });
      if (!box.current) {
        throw new Error("TRANSACTION_RESULT_UNDEFINED");
      }
      return box.current.value;
    } catch (error) {
      if (isTransientConflict(error)) {
        throw new TransactionConflictError("Concurrent update conflict", { cause: error });
      }
      throw error;
    } finally {
      await session.endSession();
    }
  }
}
