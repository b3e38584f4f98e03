import type { z } from "zod";
import type { DocumentStore, JsonObject } from "./documentStore";
import { StoreError } from "./errors";
import { parseDocument } from "./schemas";
import type { CallOptions } from "./types";

/** Typed reads over an untyped {@link DocumentStore}. */
export async function loadTyped<T>(
  store: DocumentStore,
  schema: z.ZodType<T>,
  path: string,
  options?: CallOptions,
): Promise<T | null> {
  const raw = await store.load(path, options);
  if (!raw) return null;
  return parseDocument(schema, path, raw);
}

export async function listTyped<T>(
  store: DocumentStore,
  schema: z.ZodType<T>,
  collectionPath: string,
  options?: CallOptions,
): Promise<T[]> {
  const documents = await store.list(collectionPath, options);
  const out: T[] = [];
  for (const doc of documents) {
    const parsed = parseDocument(schema, doc.path, doc.data);
    if (parsed) out.push(parsed);
  }
  return out;
}

/**
 * Typed read-modify-write. The updater sees `null` for a missing document.
 * A document that fails the schema is written back untouched and the call
 * rejects with a {@link StoreError}.
 */
export async function updateTyped<T extends JsonObject>(
  store: DocumentStore,
  schema: z.ZodType<T>,
  path: string,
  updater: (prev: T | null) => T | null,
  options?: CallOptions,
): Promise<T | null> {
  let result: T | null = null;
  let malformed = false;
  await store.update(
    path,
    (raw) => {
      malformed = false;
      if (!raw) {
        result = updater(null);
        return result;
      }
      const prev = parseDocument(schema, path, raw);
      if (!prev) {
        malformed = true;
        return raw;
      }
      result = updater(prev);
      return result;
    },
    options,
  );
  if (malformed) throw new StoreError(path, "Refusing to update a malformed document");
  return result;
}
