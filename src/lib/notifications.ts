import type { CallOptions } from "./types";

export type PushMessage = {
  token: string;
  title: string;
  body: string;
  data?: Record<string, string>;
};

/** Remote push delivery (a messaging gateway). */
export interface PushGateway {
  send(message: PushMessage, options?: CallOptions): Promise<void>;
}

export type LocalNotification = {
  title: string;
  body: string;
};

/** On-device notification display. */
export interface LocalNotifier {
  show(notification: LocalNotification): Promise<void>;
}

export function createWebhookPushGateway(endpoint: string): PushGateway {
  return {
    async send(message, options) {
      const response = await fetch(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Accept: "application/json",
        },
        body: JSON.stringify(message),
        signal: options?.signal,
      });
      if (!response.ok) {
        throw new Error(`Push gateway responded with HTTP ${response.status}`);
      }
    },
  };
}

/** Writes notifications to the console; the default when nothing else is wired. */
export const consoleNotifier: LocalNotifier = {
  async show(notification) {
    console.info(`[Daydreams][notification] ${notification.title} - ${notification.body}`);
  },
};

export const disabledPushGateway: PushGateway = {
  async send(message) {
    console.info(`[Daydreams] Push delivery disabled, dropping "${message.title}"`);
  },
};

export const messages = {
  newPrompt: (assignedAuthor: string, promptPreview: string): LocalNotification => ({
    title: "New Daydream Prompt! 🏰",
    body: `Today's prompt is ready. ${assignedAuthor} is writing: ${promptPreview}`,
  }),
  storyCompleted: (authorName: string): LocalNotification => ({
    title: "Story Complete! ✨",
    body: `${authorName} just finished their Daydream! Your turn now!`,
  }),
  localCompletion: (authorName: string): LocalNotification => ({
    title: "New Daydream Story! ✨",
    body: `${authorName} just wrote a magical Daydream! Check it out!`,
  }),
  dailyReminder: (): LocalNotification => ({
    title: "Time to Daydream 🌙",
    body: "Today's prompt is waiting for you.",
  }),
};

/** Next time the clock reads `hour:minute`, strictly after `now`. */
export function nextReminderAt(now: Date, hour: number, minute: number): Date {
  const next = new Date(now.getFullYear(), now.getMonth(), now.getDate(), hour, minute, 0, 0);
  if (next.getTime() <= now.getTime()) next.setDate(next.getDate() + 1);
  return next;
}

export type DailyReminderOptions = {
  hour: number;
  minute: number;
  notifier: LocalNotifier;
  content?: LocalNotification;
  now?: () => Date;
};

/**
 * Show a local notification every day at `hour:minute`. Returns a function
 * that cancels the schedule.
 */
export function scheduleDailyReminder(options: DailyReminderOptions): () => void {
  const now = options.now ?? (() => new Date());
  const content = options.content ?? messages.dailyReminder();
  let timer: NodeJS.Timeout | null = null;
  let cancelled = false;

  function arm() {
    if (cancelled) return;
    const current = now();
    const delay = nextReminderAt(current, options.hour, options.minute).getTime() - current.getTime();
    timer = setTimeout(() => {
      options.notifier.show(content).catch((error: unknown) => {
        console.warn("[Daydreams] Failed to show daily reminder", error);
      });
      arm();
    }, delay);
  }

  arm();
  return () => {
    cancelled = true;
    if (timer) clearTimeout(timer);
  };
}
