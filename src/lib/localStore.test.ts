import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { paths, type StoredDocument } from "./documentStore";
import { StoreError } from "./errors";
import { createLocalDocumentStore, openLocalDocumentStore } from "./localStore";

describe("local document store", () => {
  it("keeps the first write on create", async () => {
    const store = createLocalDocumentStore();

    const first = await store.create("invitations/ABC123", { status: "pending" });
    const second = await store.create("invitations/ABC123", { status: "other" });

    expect(first).toEqual({ created: true, data: { status: "pending" } });
    expect(second).toEqual({ created: false, data: { status: "pending" } });
    expect(await store.load("invitations/ABC123")).toEqual({ status: "pending" });
  });

  it("returns copies so callers cannot edit stored documents", async () => {
    const store = createLocalDocumentStore();
    const data = { name: "Alice" };
    await store.save("users/u1", data);
    data.name = "Changed";

    const loaded = await store.load("users/u1");
    expect(loaded).toEqual({ name: "Alice" });
  });

  it("deletes when an updater returns null", async () => {
    const store = createLocalDocumentStore({ initial: { "users/u1": { n: 1 } } });

    expect(await store.update("users/u1", (prev) => ({ n: Number(prev?.n ?? 0) + 1 }))).toEqual({ n: 2 });
    expect(await store.update("users/u1", () => null)).toBeNull();
    expect(await store.load("users/u1")).toBeNull();
  });

  it("lists direct children only", async () => {
    const store = createLocalDocumentStore({
      initial: {
        "users/u1": { uid: "u1" },
        "users/u1/history/s1": { id: "s1" },
        "users/u1/history/s2": { id: "s2" },
        "users/u2/history/s3": { id: "s3" },
      },
    });

    const ids = (await store.list(paths.history("u1"))).map((doc) => doc.id).sort();
    expect(ids).toEqual(["s1", "s2"]);
    expect((await store.list("users")).map((doc) => doc.id)).toEqual(["u1"]);
  });

  it("rejects paths of the wrong kind", async () => {
    const store = createLocalDocumentStore();

    await expect(store.load("users")).rejects.toThrow(StoreError);
    await expect(store.list("users/u1")).rejects.toThrow("Not a collection path (users/u1)");
  });

  it("changes nothing for an aborted call", async () => {
    const store = createLocalDocumentStore();
    const controller = new AbortController();
    controller.abort();

    await expect(store.save("users/u1", { a: 1 }, { signal: controller.signal })).rejects.toMatchObject({
      name: "AbortError",
    });
    expect(await store.load("users/u1")).toBeNull();
  });

  it("notifies subscribers right away and after each change", async () => {
    const store = createLocalDocumentStore();
    const seen: StoredDocument[][] = [];
    const unsubscribe = store.subscribe(paths.sharedStories("p1"), (docs) => seen.push(docs));

    await store.save(paths.sharedStory("p1", "2025-03-01"), { id: "s1" });
    await store.save(paths.sharedStory("p2", "2025-03-01"), { id: "other" });
    unsubscribe();
    await store.remove(paths.sharedStory("p1", "2025-03-01"));

    expect(seen).toEqual([
      [],
      [{ path: "partnerships/p1/stories/2025-03-01", id: "2025-03-01", data: { id: "s1" } }],
    ]);
  });
});

describe("file-backed local store", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "daydreams-store-"));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when the file is missing and persists writes", async () => {
    const filePath = join(dir, "store.json");
    const store = await openLocalDocumentStore(filePath);
    await store.save("users/u1", { displayName: "Alice" });

    expect(JSON.parse(await readFile(filePath, "utf8"))).toEqual({ "users/u1": { displayName: "Alice" } });

    const reopened = await openLocalDocumentStore(filePath);
    expect(await reopened.load("users/u1")).toEqual({ displayName: "Alice" });
  });

  it("refuses a file that is not JSON", async () => {
    const filePath = join(dir, "broken.json");
    await writeFile(filePath, "{not json", "utf8");

    await expect(openLocalDocumentStore(filePath)).rejects.toThrow(`Local store file is not valid JSON (${filePath})`);
  });
});
