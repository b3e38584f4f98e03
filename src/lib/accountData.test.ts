import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AccountDataService } from "./accountData";
import { paths } from "./documentStore";
import { AuthRequiredError, NotFoundError } from "./errors";
import { createLocalDocumentStore } from "./localStore";
import { INVITATION_TTL_MS, PartnershipService } from "./partnerships";
import { StaticIdentityProvider } from "./session";
import type { StoryRecord } from "./types";

function record(id: string, dayKey: string, extra: Partial<StoryRecord> = {}): StoryRecord {
  return {
    id,
    partnershipId: "p1",
    dayKey,
    assignedAt: 1,
    items: { park: "Epcot" },
    assignedAuthor: "first",
    isFavorite: false,
    ...extra,
  };
}

const finished = record("s1", "2025-03-01", { storyText: "Hi", completedAt: Date.UTC(2025, 2, 1, 21, 0) });
const open = record("s0", "2025-02-28", { isFavorite: true });

function setup() {
  const store = createLocalDocumentStore({
    initial: {
      [paths.user("alice")]: { uid: "alice", email: "alice@example.test", displayName: "Alice", partnershipId: "p1" },
      [paths.user("bob")]: { uid: "bob", email: "bob@example.test", displayName: "Bob", partnershipId: "p1" },
      [paths.partnership("p1")]: {
        id: "p1",
        user1Id: "alice",
        user2Id: "bob",
        createdAt: 1,
        enabledCategories: ["ride", "park"],
      },
      [paths.sharedStory("p1", "2025-03-01")]: finished,
      [paths.historyEntry("alice", "s1")]: finished,
      [paths.historyEntry("alice", "s0")]: open,
      [paths.favorite("alice", "s0")]: open,
      [paths.historyEntry("bob", "s1")]: finished,
      [paths.draft("alice", "s0")]: { storyId: "s0", text: "wip", savedAt: 1 },
    },
  });
  const identity = new StaticIdentityProvider({ uid: "alice", email: "alice@example.test" });
  const partnerships = new PartnershipService({ store, identity, now: () => 1_000, newCode: () => "ABC234" });
  const accountData = new AccountDataService({
    store,
    identity,
    partnerships,
    clock: () => new Date(Date.UTC(2025, 2, 2, 0, 0)),
  });
  return { store, identity, partnerships, accountData };
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe("exportUserData", () => {
  it("collects the profile, stories, partnership and invitations", async () => {
    const { accountData, partnerships } = setup();
    await partnerships.createInvitation();

    expect(await accountData.exportUserData()).toEqual({
      exportedAt: "2025-03-02T00:00:00.000Z",
      profile: { uid: "alice", email: "alice@example.test", displayName: "Alice" },
      stories: [
        {
          id: "s1",
          partnershipId: "p1",
          dayKey: "2025-03-01",
          prompt: "Park: Epcot",
          text: "Hi",
          completedAt: "2025-03-01T21:00:00.000Z",
          isFavorite: false,
        },
        {
          id: "s0",
          partnershipId: "p1",
          dayKey: "2025-02-28",
          prompt: "Park: Epcot",
          text: "",
          completedAt: null,
          isFavorite: true,
        },
      ],
      partnerships: [
        {
          id: "p1",
          user1Id: "alice",
          user2Id: "bob",
          createdAt: "1970-01-01T00:00:00.001Z",
          partnerDisplayName: "Bob",
          settings: { enabledCategories: ["park", "ride"], tripDate: null },
        },
      ],
      invitations: [
        {
          code: "ABC234",
          fromUserId: "alice",
          fromDisplayName: "Alice",
          status: "pending",
          createdAt: 1_000,
          expiresAt: 1_000 + INVITATION_TTL_MS,
        },
      ],
    });
  });

  it("needs a profile and a signed-in user", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { accountData, identity } = setup();

    identity.signIn({ uid: "carol", email: "carol@example.test" });
    await expect(accountData.exportUserData()).rejects.toThrow(NotFoundError);

    identity.signOut();
    await expect(accountData.exportUserData()).rejects.toThrow(AuthRequiredError);
  });
});

describe("deleteUserData", () => {
  it("removes the user's documents and leaves the partner's copies", async () => {
    const { accountData, partnerships, store } = setup();
    await partnerships.createInvitation();

    expect(await accountData.deleteUserData()).toEqual({
      stories: 2,
      favorites: 1,
      drafts: 1,
      invitations: 1,
      partnershipId: "p1",
    });

    expect(await store.load(paths.user("alice"))).toBeNull();
    expect(await store.list(paths.history("alice"))).toEqual([]);
    expect(await store.list(paths.favorites("alice"))).toEqual([]);
    expect(await store.list(paths.drafts("alice"))).toEqual([]);
    expect(await store.list(paths.userInvitations("alice"))).toEqual([]);
    expect(await store.load(paths.invitation("ABC234"))).toBeNull();
    expect(await store.load(paths.partnership("p1"))).toBeNull();
    expect(await store.list(paths.sharedStories("p1"))).toEqual([]);
    expect(await partnerships.getProfile("bob")).toEqual({
      uid: "bob",
      email: "bob@example.test",
      displayName: "Bob",
    });
    expect(await store.load(paths.historyEntry("bob", "s1"))).toEqual(finished);
  });
});
