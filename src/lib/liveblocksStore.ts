import {
  createClient,
  LiveMap,
  type Client,
  type JsonObject as LiveJsonObject,
  type Room,
} from "@liveblocks/client";
import WebSocket from "ws";
import "./liveblocksTypes";
import {
  documentId,
  parentCollection,
  splitPath,
  type CollectionListener,
  type DocumentStore,
  type JsonObject,
  type StoredDocument,
} from "./documentStore";
import { StoreError } from "./errors";
import type { SyncStatusRegistry } from "./syncStatus";
import { noopTelemetry, type TelemetryReporter } from "./telemetry";
import type { CallOptions } from "./types";

type LiveblocksSyncMode = "fallback-local" | "liveblocks";

export type LiveblocksConfig = {
  publicKey?: string;
  authEndpoint?: string;
};

type LiveblocksAuthResult =
  | {
      token: string;
    }
  | {
      error: string;
      reason: string;
    };

type LiveblocksRuntime = {
  initialized: boolean;
  mode: LiveblocksSyncMode;
  client: Client | null;
  sessions: Map<string, LiveblocksSession>;
};

type LiveblocksSession = {
  room: Room;
  leave: () => void;
  listeners: Map<string, Set<CollectionListener>>;
  storageUnsub: (() => void) | null;
  documents: Promise<LiveMap<string, LiveJsonObject>>;
};

export type LiveblocksDocumentStoreOptions = {
  config: LiveblocksConfig;
  fallback: DocumentStore;
  syncStatus: SyncStatusRegistry;
  telemetry?: TelemetryReporter;
};

/**
 * Room that holds a path: the first two segments, so `partnerships/p1` and
 * everything under it share one room.
 */
export function roomIdForPath(path: string): string | null {
  const segments = splitPath(path);
  if (segments.length < 2) return null;
  return `daydreams:${segments[0]}:${segments[1]}`;
}

export type LiveblocksDocumentStore = DocumentStore & {
  /** Leave every room entered so far. */
  close(): void;
};

export function createLiveblocksDocumentStore(options: LiveblocksDocumentStoreOptions): LiveblocksDocumentStore {
  const { config, fallback, syncStatus } = options;
  const telemetry = options.telemetry ?? noopTelemetry;
  let warned = false;
  let warnedLoadFailure = false;
  const runtime: LiveblocksRuntime = {
    initialized: false,
    mode: "fallback-local",
    client: null,
    sessions: new Map(),
  };

  function warnFallbackOnce() {
    if (warned) return;
    warned = true;
    console.warn("[Daydreams] Liveblocks store fallback to local store.");
  }

  function createAuthDelegate(endpoint: string) {
    return async (room?: string): Promise<LiveblocksAuthResult> => {
      const scope = typeof room === "string" ? room : undefined;
      let response: Response;
      try {
        response = await fetch(endpoint, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            Accept: "application/json",
          },
          body: JSON.stringify({ room }),
        });
      } catch {
        telemetry({ category: "auth", code: "auth_endpoint_error", reason: "network_error", scope });
        return { error: "auth_endpoint_error", reason: "network_error" };
      }
      if (!response.ok) {
        telemetry({ category: "auth", code: "auth_endpoint_error", reason: `HTTP ${response.status}`, scope });
        return { error: "auth_endpoint_error", reason: `HTTP ${response.status}` };
      }
      let body: unknown;
      try {
        body = await response.json();
      } catch {
        telemetry({ category: "auth", code: "auth_endpoint_error", reason: "invalid_json_response", scope });
        return { error: "auth_endpoint_error", reason: "invalid_json_response" };
      }
      if (typeof body === "object" && body !== null) {
        if ("token" in body && typeof body.token === "string" && body.token.length > 0) {
          return { token: body.token };
        }
        if ("error" in body && typeof body.error === "string") {
          const reason = "reason" in body && typeof body.reason === "string" ? body.reason : "unknown_reason";
          telemetry({ category: "auth", code: body.error, reason, scope });
          return { error: body.error, reason };
        }
      }
      telemetry({ category: "auth", code: "auth_endpoint_error", reason: "invalid_auth_response", scope });
      return { error: "auth_endpoint_error", reason: "invalid_auth_response" };
    };
  }

  function initializeRuntime() {
    if (runtime.initialized) return;
    runtime.initialized = true;

    if (!config.publicKey && !config.authEndpoint) {
      runtime.mode = "fallback-local";
      telemetry({ category: "sync", code: "liveblocks_init_fallback", reason: "missing_auth_config" });
      warnFallbackOnce();
      return;
    }

    try {
      runtime.client = config.authEndpoint
        ? createClient({ authEndpoint: createAuthDelegate(config.authEndpoint), polyfills: { WebSocket } })
        : createClient({ publicApiKey: config.publicKey ?? "", polyfills: { WebSocket } });
      runtime.mode = "liveblocks";
    } catch (error) {
      runtime.client = null;
      runtime.mode = "fallback-local";
      telemetry({ category: "sync", code: "liveblocks_init_fallback", reason: "create_client_failed" });
      console.warn("[Daydreams] Failed to create Liveblocks client", error);
      warnFallbackOnce();
    }
  }

  function ensureSession(roomId: string): LiveblocksSession | null {
    initializeRuntime();
    if (runtime.mode !== "liveblocks" || !runtime.client) return null;
    const existing = runtime.sessions.get(roomId);
    if (existing) return existing;

    const { room, leave } = runtime.client.enterRoom(roomId, {
      initialPresence: {},
      initialStorage: { documents: new LiveMap<string, LiveJsonObject>() },
    });

    const documents = room.getStorage().then(({ root }) => root.get("documents"));
    documents.catch((error: unknown) => markDegraded(roomId, "storage_read_failed", error));

    const session: LiveblocksSession = {
      room,
      leave,
      listeners: new Map(),
      storageUnsub: null,
      documents,
    };
    runtime.sessions.set(roomId, session);
    return session;
  }

  function markDegraded(roomId: string, reason: string, error: unknown) {
    syncStatus.set(roomId, "liveblocks", "degraded", reason);
    telemetry({ category: "sync", code: reason, reason: error instanceof Error ? error.message : "unknown", scope: roomId });
    if (!warnedLoadFailure) {
      warnedLoadFailure = true;
      console.warn("[Daydreams] Liveblocks storage unavailable. Using local cache.", error);
    }
  }

  /** Resolve the room's document map, or `null` when only the local store can serve. */
  async function documentsFor(path: string, callOptions?: CallOptions) {
    callOptions?.signal?.throwIfAborted();
    const roomId = roomIdForPath(path);
    if (!roomId) throw new StoreError(path, "Top-level collections are not shared");
    const session = ensureSession(roomId);
    if (!session) {
      syncStatus.set(roomId, "local", "degraded", "liveblocks_unavailable");
      return { roomId, documents: null };
    }
    try {
      const documents = await session.documents;
      callOptions?.signal?.throwIfAborted();
      return { roomId, documents };
    } catch (error) {
      if (callOptions?.signal?.aborted) throw error;
      return { roomId, documents: null };
    }
  }

  function childrenOf(documents: LiveMap<string, LiveJsonObject>, collectionPath: string): StoredDocument[] {
    const out: StoredDocument[] = [];
    for (const [path, data] of documents.entries()) {
      if (parentCollection(path) !== collectionPath) continue;
      out.push({ path, id: documentId(path), data });
    }
    return out;
  }

  function notifyListeners(session: LiveblocksSession, documents: LiveMap<string, LiveJsonObject>) {
    for (const [collectionPath, listeners] of session.listeners) {
      const children = childrenOf(documents, collectionPath);
      for (const listener of listeners) listener(children);
    }
  }

  async function writeThrough(path: string, data: JsonObject | null, callOptions?: CallOptions) {
    const { roomId, documents } = await documentsFor(path, callOptions);
    if (data) await fallback.save(path, data, callOptions);
    else await fallback.remove(path, callOptions);
    if (!documents) return;
    const session = runtime.sessions.get(roomId);
    if (!session) return;
    session.room.batch(() => {
      if (data) documents.set(path, data);
      else documents.delete(path);
    });
    syncStatus.set(roomId, "liveblocks", "healthy", data ? "storage_write_ok" : "storage_delete_ok");
  }

  return {
    async load(path, callOptions) {
      const { roomId, documents } = await documentsFor(path, callOptions);
      if (!documents) return fallback.load(path, callOptions);
      const current = documents.get(path);
      syncStatus.set(roomId, "liveblocks", "healthy", "storage_snapshot_loaded");
      if (!current) return null;
      await fallback.save(path, current, callOptions);
      return current;
    },
    async save(path, data, callOptions) {
      await writeThrough(path, data, callOptions);
      return data;
    },
    async create(path, data, callOptions) {
      const { roomId, documents } = await documentsFor(path, callOptions);
      if (!documents) return fallback.create(path, data, callOptions);
      const existing = documents.get(path);
      if (existing) {
        syncStatus.set(roomId, "liveblocks", "healthy", "storage_create_existing");
        return { created: false, data: existing };
      }
      await writeThrough(path, data, callOptions);
      return { created: true, data };
    },
    async update(path, updater, callOptions) {
      const { documents } = await documentsFor(path, callOptions);
      if (!documents) return fallback.update(path, updater, callOptions);
      const next = updater(documents.get(path) ?? null);
      await writeThrough(path, next, callOptions);
      return next;
    },
    async remove(path, callOptions) {
      await writeThrough(path, null, callOptions);
    },
    async list(collectionPath, callOptions) {
      const { roomId, documents } = await documentsFor(collectionPath, callOptions);
      if (!documents) return fallback.list(collectionPath, callOptions);
      syncStatus.set(roomId, "liveblocks", "healthy", "storage_list_ok");
      return childrenOf(documents, collectionPath);
    },
    subscribe(collectionPath, listener) {
      const roomId = roomIdForPath(collectionPath);
      const session = roomId ? ensureSession(roomId) : null;
      if (!roomId || !session) {
        if (roomId) syncStatus.set(roomId, "local", "degraded", "liveblocks_unavailable");
        return fallback.subscribe(collectionPath, listener);
      }

      const listeners = session.listeners.get(collectionPath) ?? new Set<CollectionListener>();
      listeners.add(listener);
      session.listeners.set(collectionPath, listeners);
      let fallbackUnsub: (() => void) | null = null;

      session.documents
        .then((documents) => {
          listener(childrenOf(documents, collectionPath));
          if (session.storageUnsub) return;
          session.storageUnsub = session.room.subscribe(documents, () => {
            syncStatus.set(roomId, "liveblocks", "healthy", "storage_subscribe_ok");
            notifyListeners(session, documents);
          });
        })
        .catch((error: unknown) => {
          markDegraded(roomId, "storage_subscribe_failed", error);
          listeners.delete(listener);
          fallbackUnsub = fallback.subscribe(collectionPath, listener);
        });

      return () => {
        fallbackUnsub?.();
        const current = session.listeners.get(collectionPath);
        if (!current) return;
        current.delete(listener);
        if (current.size === 0) session.listeners.delete(collectionPath);
      };
    },
    close() {
      for (const session of runtime.sessions.values()) {
        session.storageUnsub?.();
        session.leave();
      }
      runtime.sessions.clear();
    },
  };
}
