import { describe, expect, it } from "vitest";
import { DRAFT_TTL_MS, DraftService } from "./drafts";
import { paths } from "./documentStore";
import { createLocalDocumentStore } from "./localStore";

function setup() {
  const store = createLocalDocumentStore();
  let now = 10_000;
  const drafts = new DraftService(store, () => now);
  return {
    store,
    drafts,
    advance(ms: number) {
      now += ms;
    },
  };
}

describe("DraftService", () => {
  it("saves and loads draft text", async () => {
    const { drafts } = setup();

    expect(await drafts.saveDraft("alice", "s1", "Once upon a")).toEqual({
      storyId: "s1",
      text: "Once upon a",
      savedAt: 10_000,
    });
    expect(await drafts.loadDraft("alice", "s1")).toBe("Once upon a");
    expect(await drafts.loadDraft("bob", "s1")).toBeNull();
  });

  it("drops drafts older than the retention window on read", async () => {
    const { drafts, store, advance } = setup();
    await drafts.saveDraft("alice", "s1", "stale");

    advance(DRAFT_TTL_MS);
    expect(await drafts.loadDraft("alice", "s1")).toBe("stale");

    advance(1);
    expect(await drafts.loadDraft("alice", "s1")).toBeNull();
    expect(await store.load(paths.draft("alice", "s1"))).toBeNull();
  });

  it("cleans up only expired drafts", async () => {
    const { drafts, advance } = setup();
    await drafts.saveDraft("alice", "old", "old text");
    advance(DRAFT_TTL_MS + 1);
    await drafts.saveDraft("alice", "new", "new text");

    expect(await drafts.cleanupOldDrafts("alice")).toBe(1);
    expect(await drafts.loadDraft("alice", "new")).toBe("new text");
    expect(await drafts.loadDraft("alice", "old")).toBeNull();
  });

  it("deletes a draft", async () => {
    const { drafts } = setup();
    await drafts.saveDraft("alice", "s1", "text");

    await drafts.deleteDraft("alice", "s1");

    expect(await drafts.loadDraft("alice", "s1")).toBeNull();
  });
});
