/**
 * Mongo client singleton for the native driver.
 * Purpose: single entrypoint to obtain the client (`getMongoClient`), the
 * database handle (`getDb`) and to close both (`disconnectDb`).
 *
 * Gotchas:
 * - Multi-document transactions need a replica set (or sharded cluster); a
 *   standalone server rejects `withTransaction`.
 */
import { MongoClient, type Db } from "mongodb";
import { readEnv, requireMongoUri, type CraftingEnv } from "@/configuration/env";

let client: MongoClient | null = null;
let connecting: Promise<MongoClient> | null = null;
let dbInstance: Db | null = null;

/**
 * `env` is only read by the first call; later calls reuse the cached client.
 */
export async function getMongoClient(env: CraftingEnv = readEnv()): Promise<MongoClient> {
  if (client) return client;
  if (!connecting) {
    const candidate = new MongoClient(requireMongoUri(env));
    connecting = candidate
      .connect()
      .then((connected) => {
        client = connected;
        return connected;
      })
      .catch((error: unknown) => {
        connecting = null;
        throw error;
      });
  }
  return connecting;
}

export async function getDb(env: CraftingEnv = readEnv()): Promise<Db> {
  if (dbInstance) return dbInstance;
  const connected = await getMongoClient(env);
  dbInstance = connected.db(env.DB_NAME);
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  const current = client;
  client = null;
  connecting = null;
  dbInstance = null;
  if (current) {
    await current.close();
  }
}
