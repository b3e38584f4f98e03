import type { CallOptions } from "./types";

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;
export type JsonObject = { [key: string]: JsonValue | undefined };

export type StoredDocument = {
  path: string;
  id: string;
  data: JsonObject;
};

export type DocumentUpdater = (prev: JsonObject | null) => JsonObject | null;
export type CollectionListener = (documents: StoredDocument[]) => void;

export type CreateResult = {
  created: boolean;
  data: JsonObject;
};

/**
 * Shared document-store contract.
 *
 * Requirements (all stores):
 * - Paths alternate collection and document ids: `users/u1/history/s1`.
 * - `create` never overwrites: the first writer wins and later writers get
 *   the existing document back with `created: false`.
 * - `update` is a read-modify-write; an updater returning `null` deletes.
 * - `list` returns the direct children of a collection only.
 * - `subscribe` calls the listener with the current children once they are
 *   known and again after every change, and returns an unsubscribe function.
 *   The local store delivers the first snapshot synchronously; the Liveblocks
 *   store delivers it after the room's storage has loaded.
 * - Aborted calls reject with the signal's reason and change nothing.
 */
export interface DocumentStore {
  load(path: string, options?: CallOptions): Promise<JsonObject | null>;
  save(path: string, data: JsonObject, options?: CallOptions): Promise<JsonObject>;
  create(path: string, data: JsonObject, options?: CallOptions): Promise<CreateResult>;
  update(path: string, updater: DocumentUpdater, options?: CallOptions): Promise<JsonObject | null>;
  remove(path: string, options?: CallOptions): Promise<void>;
  list(collectionPath: string, options?: CallOptions): Promise<StoredDocument[]>;
  subscribe(collectionPath: string, listener: CollectionListener): () => void;
}

export function splitPath(path: string): string[] {
  return path.split("/").filter((segment) => segment.length > 0);
}

export function joinPath(...segments: string[]): string {
  return segments.join("/");
}

export function isDocumentPath(path: string): boolean {
  const segments = splitPath(path);
  return segments.length > 0 && segments.length % 2 === 0;
}

export function isCollectionPath(path: string): boolean {
  return splitPath(path).length % 2 === 1;
}

/** Collection that directly holds the document at `path`. */
export function parentCollection(path: string): string {
  return splitPath(path).slice(0, -1).join("/");
}

export function documentId(path: string): string {
  const segments = splitPath(path);
  return segments[segments.length - 1] ?? "";
}

export const paths = {
  user: (uid: string) => joinPath("users", uid),
  history: (uid: string) => joinPath("users", uid, "history"),
  historyEntry: (uid: string, storyId: string) => joinPath("users", uid, "history", storyId),
  favorites: (uid: string) => joinPath("users", uid, "favorites"),
  favorite: (uid: string, storyId: string) => joinPath("users", uid, "favorites", storyId),
  drafts: (uid: string) => joinPath("users", uid, "drafts"),
  draft: (uid: string, storyId: string) => joinPath("users", uid, "drafts", storyId),
  partnership: (pid: string) => joinPath("partnerships", pid),
  sharedStories: (pid: string) => joinPath("partnerships", pid, "stories"),
  sharedStory: (pid: string, dayKey: string) => joinPath("partnerships", pid, "stories", dayKey),
  invitation: (code: string) => joinPath("invitations", code),
  userInvitations: (uid: string) => joinPath("users", uid, "invitations"),
  userInvitation: (uid: string, code: string) => joinPath("users", uid, "invitations", code),
};
