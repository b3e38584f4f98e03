import { readFile, writeFile } from "node:fs/promises";
import {
  documentId,
  isCollectionPath,
  isDocumentPath,
  parentCollection,
  splitPath,
  type CollectionListener,
  type DocumentStore,
  type JsonObject,
  type StoredDocument,
} from "./documentStore";
import { StoreError } from "./errors";

export type LocalDocumentStoreOptions = {
  /** Persist every change to this JSON file. */
  filePath?: string;
  initial?: Record<string, JsonObject>;
};

function assertDocumentPath(path: string) {
  if (!isDocumentPath(path)) throw new StoreError(path, "Not a document path");
}

function normalize(path: string): string {
  return splitPath(path).join("/");
}

export function createLocalDocumentStore(options: LocalDocumentStoreOptions = {}): DocumentStore {
  const documents = new Map<string, JsonObject>();
  const listeners = new Map<string, Set<CollectionListener>>();
  let persistQueue: Promise<void> = Promise.resolve();

  for (const [path, data] of Object.entries(options.initial ?? {})) {
    documents.set(normalize(path), structuredClone(data));
  }

  function childrenOf(collectionPath: string): StoredDocument[] {
    const prefix = `${collectionPath}/`;
    const out: StoredDocument[] = [];
    for (const [path, data] of documents) {
      if (!path.startsWith(prefix)) continue;
      if (parentCollection(path) !== collectionPath) continue;
      out.push({ path, id: documentId(path), data: structuredClone(data) });
    }
    return out;
  }

  function persist(): Promise<void> {
    const { filePath } = options;
    if (!filePath) return Promise.resolve();
    const snapshot = JSON.stringify(Object.fromEntries(documents), null, 2);
    persistQueue = persistQueue
      .catch(() => undefined)
      .then(() => writeFile(filePath, snapshot, "utf8"))
      .catch((error: unknown) => {
        throw new StoreError(filePath, "Failed to persist local store", { cause: error });
      });
    return persistQueue;
  }

  function notify(path: string) {
    const collectionPath = parentCollection(path);
    const collectionListeners = listeners.get(collectionPath);
    if (!collectionListeners || collectionListeners.size === 0) return;
    const children = childrenOf(collectionPath);
    for (const listener of collectionListeners) listener(children);
  }

  async function write(path: string, data: JsonObject | null) {
    if (data) documents.set(path, structuredClone(data));
    else documents.delete(path);
    notify(path);
    await persist();
  }

  return {
    async load(path, callOptions) {
      callOptions?.signal?.throwIfAborted();
      assertDocumentPath(path);
      const found = documents.get(normalize(path));
      return found ? structuredClone(found) : null;
    },
    async save(path, data, callOptions) {
      callOptions?.signal?.throwIfAborted();
      assertDocumentPath(path);
      await write(normalize(path), data);
      return structuredClone(data);
    },
    async create(path, data, callOptions) {
      callOptions?.signal?.throwIfAborted();
      assertDocumentPath(path);
      const key = normalize(path);
      const existing = documents.get(key);
      if (existing) return { created: false, data: structuredClone(existing) };
      await write(key, data);
      return { created: true, data: structuredClone(data) };
    },
    async update(path, updater, callOptions) {
      callOptions?.signal?.throwIfAborted();
      assertDocumentPath(path);
      const key = normalize(path);
      const prev = documents.get(key);
      const next = updater(prev ? structuredClone(prev) : null);
      await write(key, next);
      return next ? structuredClone(next) : null;
    },
    async remove(path, callOptions) {
      callOptions?.signal?.throwIfAborted();
      assertDocumentPath(path);
      const key = normalize(path);
      if (!documents.has(key)) return;
      await write(key, null);
    },
    async list(collectionPath, callOptions) {
      callOptions?.signal?.throwIfAborted();
      if (!isCollectionPath(collectionPath)) throw new StoreError(collectionPath, "Not a collection path");
      return childrenOf(normalize(collectionPath));
    },
    subscribe(collectionPath, listener) {
      const key = normalize(collectionPath);
      const set = listeners.get(key) ?? new Set<CollectionListener>();
      set.add(listener);
      listeners.set(key, set);
      listener(childrenOf(key));
      return () => {
        const current = listeners.get(key);
        if (!current) return;
        current.delete(listener);
        if (current.size === 0) listeners.delete(key);
      };
    },
  };
}

/**
 * Open a file-backed local store, reading whatever the file already holds.
 * A missing file starts an empty store.
 */
export async function openLocalDocumentStore(filePath: string): Promise<DocumentStore> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return createLocalDocumentStore({ filePath });
    }
    throw new StoreError(filePath, "Failed to read local store", { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new StoreError(filePath, "Local store file is not valid JSON", { cause: error });
  }
  if (!isJsonObjectRecord(parsed)) {
    throw new StoreError(filePath, "Local store file must map paths to objects");
  }
  return createLocalDocumentStore({ filePath, initial: parsed });
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isJsonObjectRecord(value: unknown): value is Record<string, JsonObject> {
  if (!isJsonObject(value)) return false;
  return Object.values(value).every(isJsonObject);
}
