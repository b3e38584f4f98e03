import { afterEach, describe, expect, it, vi } from "vitest";
import { paths } from "./documentStore";
import { StoreError } from "./errors";
import { createLocalDocumentStore } from "./localStore";
import { listTyped, loadTyped, updateTyped } from "./repository";
import { storyDraftSchema } from "./schemas";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("typed repository helpers", () => {
  it("skips malformed documents with a warning", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = createLocalDocumentStore({
      initial: {
        [paths.draft("alice", "s1")]: { storyId: "s1", text: "ok", savedAt: 1 },
        [paths.draft("alice", "s2")]: { storyId: "s2", text: 42, savedAt: 1 },
      },
    });

    const drafts = await listTyped(store, storyDraftSchema, paths.drafts("alice"));

    expect(drafts).toEqual([{ storyId: "s1", text: "ok", savedAt: 1 }]);
    expect(warn).toHaveBeenCalledWith(
      "[Daydreams] Skipping malformed document at users/alice/drafts/s2 (text: Expected string, received number)",
    );
  });

  it("reads a missing document as null", async () => {
    const store = createLocalDocumentStore();

    expect(await loadTyped(store, storyDraftSchema, paths.draft("alice", "s1"))).toBeNull();
  });

  it("hands the updater the parsed document", async () => {
    const store = createLocalDocumentStore({
      initial: { [paths.draft("alice", "s1")]: { storyId: "s1", text: "a", savedAt: 1 } },
    });

    const updated = await updateTyped(store, storyDraftSchema, paths.draft("alice", "s1"), (prev) =>
      prev ? { ...prev, text: `${prev.text}b` } : null,
    );

    expect(updated).toEqual({ storyId: "s1", text: "ab", savedAt: 1 });
    expect(await store.load(paths.draft("alice", "s1"))).toEqual(updated);
  });

  it("leaves a malformed document in place and rejects the update", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const malformed = { storyId: "s1", text: 42, savedAt: 1 };
    const store = createLocalDocumentStore({ initial: { [paths.draft("alice", "s1")]: malformed } });
    const updater = vi.fn(() => null);

    await expect(updateTyped(store, storyDraftSchema, paths.draft("alice", "s1"), updater)).rejects.toThrow(
      new StoreError(paths.draft("alice", "s1"), "Refusing to update a malformed document"),
    );
    expect(updater).not.toHaveBeenCalled();
    expect(await store.load(paths.draft("alice", "s1"))).toEqual(malformed);
  });
});
