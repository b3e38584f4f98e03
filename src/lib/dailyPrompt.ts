import { randomUUID } from "node:crypto";
import { systemClock, toDayKey, type Clock } from "./calendar";
import { getBundledCatalog, normalizeCategories } from "./categories";
import { PromptDeck, type RandomSource } from "./deck";
import { paths, type CreateResult, type DocumentStore } from "./documentStore";
import type { PartnershipService } from "./partnerships";
import type { NotificationService } from "./partnerNotifications";
import { listTyped, loadTyped, updateTyped } from "./repository";
import { parseDocument, partnershipSchema, storyRecordSchema } from "./schemas";
import { noopTelemetry, type TelemetryReporter } from "./telemetry";
import { isUsersTurn, nextAuthor } from "./turn";
import type { AuthorSlot, CallOptions, CategoryCatalog, Partnership, StoryRecord } from "./types";

export type DailyPromptState = "NoPromptToday" | "PromptPending" | "PromptPersisted";

export type TodayPrompt = {
  record: StoryRecord;
  /** False when the record already existed, including when a partner won the race. */
  created: boolean;
};

type StateListener = (state: DailyPromptState, dayKey: string) => void;

export type DailyPromptCoordinatorDeps = {
  store: DocumentStore;
  partnerships: PartnershipService;
  notifications?: NotificationService;
  catalog?: CategoryCatalog;
  clock?: Clock;
  random?: RandomSource;
  newId?: () => string;
  telemetry?: TelemetryReporter;
};

/** Newest shared record first: by day, then by assignment time. */
export function compareNewestFirst(a: StoryRecord, b: StoryRecord): number {
  if (a.dayKey !== b.dayKey) return a.dayKey < b.dayKey ? 1 : -1;
  return b.assignedAt - a.assignedAt;
}

/** Settle with `promise`, or reject with the signal's reason if it aborts first. */
function untilAborted<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return promise;
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}

/**
 * Get-or-create for the partnership's prompt of the day.
 *
 * The shared record lives at `partnerships/{pid}/stories/{dayKey}` and is
 * written with `create`, so when both partners race the first write wins and
 * the other side adopts it. A failed write leaves the state at
 * `NoPromptToday`; the next call tries again.
 */
export class DailyPromptCoordinator {
  private readonly store: DocumentStore;
  private readonly partnerships: PartnershipService;
  private readonly notifications: NotificationService | null;
  private readonly catalog: CategoryCatalog;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly newId: () => string;
  private readonly telemetry: TelemetryReporter;

  private currentState: DailyPromptState = "NoPromptToday";
  private stateDay: string | null = null;
  private deck: PromptDeck | null = null;
  private inFlight: Promise<TodayPrompt> | null = null;
  private failureLoggedFor: string | null = null;
  private readonly listeners = new Set<StateListener>();

  constructor(deps: DailyPromptCoordinatorDeps) {
    this.store = deps.store;
    this.partnerships = deps.partnerships;
    this.notifications = deps.notifications ?? null;
    this.catalog = deps.catalog ?? getBundledCatalog();
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
    this.newId = deps.newId ?? randomUUID;
    this.telemetry = deps.telemetry ?? noopTelemetry;
  }

  /** State for the current day; a new day starts over at `NoPromptToday`. */
  get state(): DailyPromptState {
    if (this.stateDay !== toDayKey(this.clock())) return "NoPromptToday";
    return this.currentState;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Concurrent callers in this process share one lookup/creation. The shared
   * work runs without a signal; each caller's own signal only ends its wait.
   */
  getOrCreateToday(options?: CallOptions): Promise<TodayPrompt> {
    this.inFlight ??= this.resolveToday().finally(() => {
      this.inFlight = null;
    });
    return untilAborted(this.inFlight, options?.signal);
  }

  async findToday(partnershipId: string, options?: CallOptions): Promise<StoryRecord | null> {
    const today = toDayKey(this.clock());
    return loadTyped(this.store, storyRecordSchema, paths.sharedStory(partnershipId, today), options);
  }

  async latestShared(partnershipId: string, options?: CallOptions): Promise<StoryRecord | null> {
    const records = await listTyped(this.store, storyRecordSchema, paths.sharedStories(partnershipId), options);
    records.sort(compareNewestFirst);
    return records[0] ?? null;
  }

  /**
   * Swap today's combination for the next one in the deck. The author and
   * id stay; a prompt that already has a story is left alone.
   */
  async redraw(options?: CallOptions): Promise<TodayPrompt> {
    const { partnership } = await this.partnerships.requirePartnership("redraw", options);
    const today = toDayKey(this.clock());
    const path = paths.sharedStory(partnership.id, today);
    const deck = this.deckFor(partnership);

    const updated = await updateTyped(
      this.store,
      storyRecordSchema,
      path,
      (prev) => {
        if (!prev || prev.storyText) return prev;
        return { ...prev, items: deck.draw(), assignedAt: this.clock().getTime() };
      },
      options,
    );
    if (!updated) return this.getOrCreateToday(options);
    if (updated.storyText) {
      console.info(`[Daydreams] Today's prompt for ${partnership.id} already has a story, not redrawing`);
      return { record: updated, created: false };
    }
    await this.refreshHistoryItems(partnership, updated, options);
    this.setState("PromptPersisted", today);
    return { record: updated, created: true };
  }

  async isCurrentUsersTurn(uid: string, options?: CallOptions): Promise<boolean> {
    const partnership = await this.partnerships.getPartnershipForUser(uid, options);
    if (!partnership) return false;
    return isUsersTurn(await this.findToday(partnership.id, options), partnership, uid);
  }

  /** Follow today's shared record as it changes. */
  watchToday(partnershipId: string, listener: (record: StoryRecord | null) => void): () => void {
    return this.store.subscribe(paths.sharedStories(partnershipId), (documents) => {
      const today = toDayKey(this.clock());
      const doc = documents.find((d) => d.id === today);
      listener(doc ? parseDocument(storyRecordSchema, doc.path, doc.data) : null);
    });
  }

  private async resolveToday(): Promise<TodayPrompt> {
    const { user, partnership } = await this.partnerships.requirePartnership("getOrCreateToday");
    const today = toDayKey(this.clock());
    const path = paths.sharedStory(partnership.id, today);

    const existing = await loadTyped(this.store, storyRecordSchema, path);
    if (existing) {
      this.setState("PromptPersisted", today);
      return { record: existing, created: false };
    }

    const latest = await this.latestShared(partnership.id);
    const pending = this.drawRecord(partnership, today, nextAuthor(latest?.assignedAuthor));
    this.setState("PromptPending", today);

    let result: CreateResult;
    try {
      result = await this.store.create(path, pending);
    } catch (error) {
      this.setState("NoPromptToday", today);
      this.logWriteFailure(partnership.id, today, error);
      throw error;
    }

    const record = parseDocument(storyRecordSchema, path, result.data) ?? pending;
    this.setState("PromptPersisted", today);
    if (!result.created) {
      console.info(`[Daydreams] Prompt for ${today} was already created by the partner`);
      return { record, created: false };
    }

    await this.afterCreate(user.uid, partnership, record);
    return { record, created: true };
  }

  private deckFor(partnership: Partnership): PromptDeck {
    const categories = normalizeCategories(partnership.enabledCategories);
    if (!this.deck || !this.deck.matches(categories)) {
      this.deck = new PromptDeck(categories, this.catalog, this.random);
      console.info(`[Daydreams] Deck rebuilt with ${this.deck.size} combinations (${categories.join(", ")})`);
    }
    return this.deck;
  }

  private drawRecord(partnership: Partnership, dayKey: string, author: AuthorSlot): StoryRecord {
    return {
      id: this.newId(),
      partnershipId: partnership.id,
      dayKey,
      assignedAt: this.clock().getTime(),
      items: this.deckFor(partnership).draw(),
      assignedAuthor: author,
      isFavorite: false,
    };
  }

  /**
   * Mirror into both members' histories, stamp the partnership and tell the
   * partner. The shared record is already persisted, so failures here are
   * logged and reported instead of thrown.
   */
  private async afterCreate(uid: string, partnership: Partnership, record: StoryRecord) {
    try {
      for (const member of [partnership.user1Id, partnership.user2Id]) {
        await this.store.save(paths.historyEntry(member, record.id), record);
      }
      await updateTyped(
        this.store,
        partnershipSchema,
        paths.partnership(partnership.id),
        (prev) => (prev ? { ...prev, lastStoryDay: record.dayKey } : null),
      );
    } catch (error) {
      console.warn(`[Daydreams] Prompt ${record.id} saved but history mirror failed`, error);
      this.telemetry({
        category: "mirror",
        code: "history_mirror_failed",
        reason: error instanceof Error ? error.message : "unknown",
        scope: partnership.id,
      });
    }
    await this.notifications?.notifyPartnerOfNewPrompt(partnership, uid, record);
  }

  /** Copy redrawn items into each member's history; a failed copy is reported, not thrown. */
  private async refreshHistoryItems(partnership: Partnership, record: StoryRecord, options?: CallOptions) {
    for (const member of [partnership.user1Id, partnership.user2Id]) {
      try {
        await updateTyped(
          this.store,
          storyRecordSchema,
          paths.historyEntry(member, record.id),
          (prev) => ({ ...record, isFavorite: prev?.isFavorite ?? false }),
          options,
        );
      } catch (error) {
        if (options?.signal?.aborted) throw error;
        console.warn(`[Daydreams] Redrawn prompt ${record.id} not copied to ${member}'s history`, error);
        this.telemetry({
          category: "mirror",
          code: "history_mirror_failed",
          reason: error instanceof Error ? error.message : "unknown",
          scope: partnership.id,
        });
      }
    }
  }

  private logWriteFailure(partnershipId: string, dayKey: string, error: unknown) {
    this.telemetry({
      category: "prompt",
      code: "daily_prompt_write_failed",
      reason: error instanceof Error ? error.message : "unknown",
      scope: partnershipId,
    });
    if (this.failureLoggedFor === dayKey) return;
    this.failureLoggedFor = dayKey;
    console.warn(`[Daydreams] Failed to save daily prompt for ${dayKey}`, error);
  }

  private setState(state: DailyPromptState, dayKey: string) {
    if (this.currentState === state && this.stateDay === dayKey) return;
    this.currentState = state;
    this.stateDay = dayKey;
    for (const listener of this.listeners) listener(state, dayKey);
  }
}
