import { afterEach, describe, expect, it, vi } from "vitest";
import { createWebhookPushGateway, messages, nextReminderAt, scheduleDailyReminder } from "./notifications";

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
});

describe("nextReminderAt", () => {
  it("picks later today when the time has not passed", () => {
    expect(nextReminderAt(new Date(2025, 0, 1, 19, 0), 20, 0)).toEqual(new Date(2025, 0, 1, 20, 0));
  });

  it("moves to tomorrow at or after the reminder time", () => {
    expect(nextReminderAt(new Date(2025, 0, 1, 20, 0), 20, 0)).toEqual(new Date(2025, 0, 2, 20, 0));
    expect(nextReminderAt(new Date(2025, 0, 31, 21, 30), 8, 15)).toEqual(new Date(2025, 1, 1, 8, 15));
  });
});

describe("scheduleDailyReminder", () => {
  it("fires once a day until cancelled", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date(2025, 0, 1, 19, 0));
    const show = vi.fn(async () => undefined);

    const cancel = scheduleDailyReminder({ hour: 20, minute: 0, notifier: { show } });

    await vi.advanceTimersByTimeAsync(59 * 60 * 1000);
    expect(show).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(60 * 1000);
    expect(show).toHaveBeenCalledTimes(1);
    expect(show).toHaveBeenCalledWith({ title: "Time to Daydream 🌙", body: "Today's prompt is waiting for you." });

    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(show).toHaveBeenCalledTimes(2);

    cancel();
    await vi.advanceTimersByTimeAsync(24 * 60 * 60 * 1000);
    expect(show).toHaveBeenCalledTimes(2);
  });
});

describe("messages", () => {
  it("names the author and the prompt", () => {
    expect(messages.newPrompt("Alice", "Park: Epcot")).toEqual({
      title: "New Daydream Prompt! 🏰",
      body: "Today's prompt is ready. Alice is writing: Park: Epcot",
    });
    expect(messages.storyCompleted("Bob").body).toBe("Bob just finished their Daydream! Your turn now!");
  });
});

describe("webhook push gateway", () => {
  it("posts the message as JSON", async () => {
    const fetchMock = vi.fn(async (_input: string, _init?: RequestInit) => new Response(null, { status: 200 }));
    vi.stubGlobal("fetch", fetchMock);
    const gateway = createWebhookPushGateway("https://push.example.test/send");

    await gateway.send({ token: "test-token", title: "Hi", body: "There", data: { type: "new_prompt" } });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://push.example.test/send");
    expect(JSON.parse(String(init?.body))).toEqual({
      token: "test-token",
      title: "Hi",
      body: "There",
      data: { type: "new_prompt" },
    });
  });

  it("fails on a non-ok response", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(null, { status: 500 })));
    const gateway = createWebhookPushGateway("https://push.example.test/send");

    await expect(gateway.send({ token: "test-token", title: "Hi", body: "There" })).rejects.toThrow(
      "Push gateway responded with HTTP 500",
    );
  });
});
