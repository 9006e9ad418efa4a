/**
 * Process environment for the crafting service.
 *
 * Role in system:
 * - Loads `.env` once (dotenv) and validates the variables the data layer needs.
 *
 * Gotchas:
 * - `MONGO_URI` is only required by the mongo backend; `requireMongoUri` throws
 *   when it is missing so the failure happens at connect time, not import time.
 */
import "dotenv/config";
import { z } from "zod";

const optionalString = z
  .string()
  .transform((value) => value.trim())
  .optional()
  .transform((value) => (value ? value : undefined));

export const EnvSchema = z.object({
  MONGO_URI: optionalString,
  DB_NAME: optionalString.transform((value) => value ?? "crafting"),
  CRAFTING_BACKEND: z.enum(["mongo", "memory"]).catch("mongo"),
  NODE_ENV: optionalString.transform((value) => value ?? "development"),
});

export type CraftingEnv = z.infer<typeof EnvSchema>;

/** Parse an environment record; unknown keys are ignored. */
export function readEnv(source: NodeJS.ProcessEnv = process.env): CraftingEnv {
  return EnvSchema.parse(source);
}

export function requireMongoUri(env: CraftingEnv = readEnv()): string {
  if (!env.MONGO_URI) {
    throw new Error("MongoDB URI not configured (MONGO_URI).");
  }
  return env.MONGO_URI;
}
