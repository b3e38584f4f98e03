import { afterEach, describe, expect, it, vi } from "vitest";
import { paths } from "./documentStore";
import { createLocalDocumentStore } from "./localStore";
import { NotificationService } from "./partnerNotifications";
import type { Partnership, StoryRecord } from "./types";

afterEach(() => {
  vi.restoreAllMocks();
});

const partnership: Partnership = {
  id: "p1",
  user1Id: "alice",
  user2Id: "bob",
  createdAt: 1,
  enabledCategories: ["park", "ride"],
};

const record: StoryRecord = {
  id: "s1",
  partnershipId: "p1",
  dayKey: "2025-03-01",
  assignedAt: 1,
  items: { ride: "Soarin", park: "Epcot" },
  assignedAuthor: "second",
  isFavorite: false,
};

function setup() {
  const store = createLocalDocumentStore({
    initial: {
      [paths.user("alice")]: { uid: "alice", email: "alice@example.test", displayName: "Alice", pushToken: "alice-token" },
      [paths.user("bob")]: { uid: "bob", email: "bob@example.test", displayName: "Bob", pushToken: "bob-token" },
    },
  });
  const send = vi.fn(async () => undefined);
  const show = vi.fn(async () => undefined);
  const telemetry = vi.fn();
  const service = new NotificationService({ store, push: { send }, local: { show }, telemetry });
  return { store, send, show, telemetry, service };
}

describe("NotificationService", () => {
  it("tells the partner who is writing today's prompt", async () => {
    const { service, send } = setup();

    expect(await service.notifyPartnerOfNewPrompt(partnership, "alice", record)).toBe(true);
    expect(send).toHaveBeenCalledWith(
      {
        token: "bob-token",
        title: "New Daydream Prompt! 🏰",
        body: "Today's prompt is ready. Bob is writing: Park: Epcot, Ride: Soarin",
        data: { type: "new_prompt", dayKey: "2025-03-01" },
      },
      undefined,
    );
  });

  it("tells the partner a story is finished", async () => {
    const { service, send } = setup();

    expect(await service.notifyPartnerOfStoryCompletion(partnership, "bob", record)).toBe(true);
    expect(send).toHaveBeenCalledWith(
      {
        token: "alice-token",
        title: "Story Complete! ✨",
        body: "Bob just finished their Daydream! Your turn now!",
        data: { type: "story_completed", author: "Bob", prompt: "Park: Epcot, Ride: Soarin" },
      },
      undefined,
    );
  });

  it("skips partners without a push token", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { service, send, store } = setup();
    await store.save(paths.user("alice"), { uid: "alice", email: "alice@example.test", displayName: "Alice" });

    expect(await service.notifyPartnerOfStoryCompletion(partnership, "bob", record)).toBe(false);
    expect(send).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Daydreams] No push token for alice, skipping "story_completed" notification');
  });

  it("reports delivery failures without throwing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { service, send, telemetry } = setup();
    send.mockRejectedValueOnce(new Error("HTTP 500"));

    expect(await service.notifyPartnerOfNewPrompt(partnership, "alice", record)).toBe(false);
    expect(telemetry).toHaveBeenCalledWith({ category: "notify", code: "push_failed", reason: "HTTP 500", scope: "p1" });
  });

  it("reports profile lookup failures without throwing", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { service, send, store, telemetry } = setup();
    vi.spyOn(store, "load").mockRejectedValue(new Error("network down"));

    expect(await service.notifyPartnerOfStoryCompletion(partnership, "bob", record)).toBe(false);
    expect(send).not.toHaveBeenCalled();
    expect(telemetry).toHaveBeenCalledWith({ category: "notify", code: "push_failed", reason: "network down", scope: "p1" });
  });

  it("still rejects an aborted call", async () => {
    const { service, store } = setup();
    const controller = new AbortController();
    controller.abort(new Error("user left screen"));
    vi.spyOn(store, "load").mockRejectedValue(new Error("aborted"));

    await expect(
      service.notifyPartnerOfNewPrompt(partnership, "alice", record, { signal: controller.signal }),
    ).rejects.toThrow("aborted");
  });

  it("ignores senders outside the partnership", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { service, send } = setup();

    expect(await service.notifyPartnerOfNewPrompt(partnership, "carol", record)).toBe(false);
    expect(send).not.toHaveBeenCalled();
  });

  it("falls back to the uid for unknown names", async () => {
    const { service } = setup();

    expect(await service.displayName("carol")).toBe("carol");
  });

  it("shows local completion notices", async () => {
    const { service, show } = setup();

    await service.notifyLocalCompletion("Bob");

    expect(show).toHaveBeenCalledWith({
      title: "New Daydream Story! ✨",
      body: "Bob just wrote a magical Daydream! Check it out!",
    });
  });
});
