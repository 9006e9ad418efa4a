/**
 * Motivation: share data layer utilities without replicating them in every repository.
 *
 * Scope: pure functions; nothing here opens connections or runs queries.
 */
import type { ZodType, ZodTypeDef } from "zod";

/**
 * Deep copy so callers (caches, the in-process database) can hand out or
 * mutate values without aliasing stored state. Keeps `Date` and `Map` intact.
 */
export function deepClone<T>(value: T): T {
  if (value === null || value === undefined) return value;
  return structuredClone(value);
}

/** Normalizes anything caught into an `Error`. */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Validates a raw document against its schema.
 *
 * Returns `null` (and logs) when the document does not match, so one broken
 * row never fails a whole listing.
 */
export function parseDocument<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  doc: unknown,
  label: string,
): T | null {
  const parsed = schema.safeParse(doc);
  if (parsed.success) return parsed.data;

  console.error(`[${label}] invalid document; skipping`, {
    id: documentId(doc),
    error: parsed.error.issues,
  });
  return null;
}

function documentId(doc: unknown): string {
  if (doc && typeof doc === "object" && "_id" in doc) {
    return String(doc._id);
  }
  return "unknown";
}

/** Generate a sortable, collision-resistant id with a readable prefix. */
export function generateId(prefix: string): string {
  return `${prefix}_${Date.now().toString(36)}_${Math.random().toString(36).substring(2, 11)}`;
}
