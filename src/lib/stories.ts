import { systemClock, toDayKey, type Clock } from "./calendar";
import { compareNewestFirst } from "./dailyPrompt";
import { paths, type DocumentStore, type JsonObject } from "./documentStore";
import type { DraftService } from "./drafts";
import { categorizeError, NotFoundError } from "./errors";
import type { NotificationService } from "./partnerNotifications";
import type { PartnershipService } from "./partnerships";
import { listTyped, updateTyped } from "./repository";
import { parseDocument, storyRecordSchema } from "./schemas";
import { requireUser, type IdentityProvider } from "./session";
import { noopTelemetry, type TelemetryReporter } from "./telemetry";
import { partnerOf, userForSlot } from "./turn";
import type { CallOptions, Partnership, StoryRecord } from "./types";
import { validateStoryText } from "./validation";

export type MirrorTarget = "shared" | "history" | "partnerHistory" | "favorites";

export type SaveStoryResult =
  | { ok: true; skipped: true }
  | { ok: true; skipped: false; record: StoryRecord }
  | { ok: false; failed: MirrorTarget; message: string };

type MirrorWrite = {
  target: MirrorTarget;
  path: string;
  previous: JsonObject | null;
  next: JsonObject;
};

export type StoryServiceDeps = {
  store: DocumentStore;
  identity: IdentityProvider;
  partnerships: PartnershipService;
  drafts: DraftService;
  notifications?: NotificationService;
  clock?: Clock;
  telemetry?: TelemetryReporter;
};

/**
 * Story text and the per-user copies of shared records.
 *
 * Each shared record has a history copy per member and, once favorited, a
 * favorites copy. Text is written shared → own history → partner's history →
 * own favorites; when a later write fails the earlier ones are put back.
 */
export class StoryService {
  private readonly store: DocumentStore;
  private readonly identity: IdentityProvider;
  private readonly partnerships: PartnershipService;
  private readonly drafts: DraftService;
  private readonly notifications: NotificationService | null;
  private readonly clock: Clock;
  private readonly telemetry: TelemetryReporter;

  constructor(deps: StoryServiceDeps) {
    this.store = deps.store;
    this.identity = deps.identity;
    this.partnerships = deps.partnerships;
    this.drafts = deps.drafts;
    this.notifications = deps.notifications ?? null;
    this.clock = deps.clock ?? systemClock;
    this.telemetry = deps.telemetry ?? noopTelemetry;
  }

  async saveStoryText(dayKey: string, text: string, options?: CallOptions): Promise<SaveStoryResult> {
    const { user, partnership } = await this.partnerships.requirePartnership("saveStoryText", options);
    if (text.trim().length === 0) return { ok: true, skipped: true };
    const storyText = validateStoryText(text);

    const sharedPath = paths.sharedStory(partnership.id, dayKey);
    const sharedRaw = await this.store.load(sharedPath, options);
    const shared = sharedRaw ? parseDocument(storyRecordSchema, sharedPath, sharedRaw) : null;
    if (!sharedRaw || !shared) throw new NotFoundError(`Story for ${dayKey}`);

    const completed: StoryRecord = { ...shared, storyText, completedAt: this.clock().getTime() };
    const writes = await this.planMirrorWrites(user.uid, partnership, sharedPath, sharedRaw, completed, options);

    const done: MirrorWrite[] = [];
    for (const write of writes) {
      try {
        await this.store.save(write.path, write.next, options);
        done.push(write);
      } catch (error) {
        if (options?.signal?.aborted) throw error;
        console.warn(`[Daydreams] Story ${completed.id}: ${write.target} write failed, rolling back`, error);
        this.telemetry({
          category: "mirror",
          code: `${write.target}_write_failed`,
          reason: error instanceof Error ? error.message : "unknown",
          scope: partnership.id,
        });
        await this.compensate(done.reverse(), partnership.id);
        return { ok: false, failed: write.target, message: categorizeError(error).message };
      }
    }

    await this.notifications?.notifyPartnerOfStoryCompletion(partnership, user.uid, completed, options);
    try {
      await this.drafts.deleteDraft(user.uid, completed.id, options);
    } catch (error) {
      console.warn(`[Daydreams] Could not delete draft for story ${completed.id}`, error);
    }
    return { ok: true, skipped: false, record: completed };
  }

  /** Flip the signed-in user's favorite flag; returns the new value. */
  async toggleFavorite(storyId: string, options?: CallOptions): Promise<boolean> {
    const user = requireUser(this.identity, "toggleFavorite");
    const updated = await updateTyped(
      this.store,
      storyRecordSchema,
      paths.historyEntry(user.uid, storyId),
      (prev) => (prev ? { ...prev, isFavorite: !prev.isFavorite } : null),
      options,
    );
    if (!updated) throw new NotFoundError(`Story ${storyId}`);
    if (updated.isFavorite) await this.store.save(paths.favorite(user.uid, storyId), updated, options);
    else await this.store.remove(paths.favorite(user.uid, storyId), options);
    return updated.isFavorite;
  }

  async removeFavorite(storyId: string, options?: CallOptions): Promise<void> {
    const user = requireUser(this.identity, "removeFavorite");
    await updateTyped(
      this.store,
      storyRecordSchema,
      paths.historyEntry(user.uid, storyId),
      (prev) => (prev ? { ...prev, isFavorite: false } : null),
      options,
    );
    await this.store.remove(paths.favorite(user.uid, storyId), options);
  }

  async listHistory(options?: CallOptions): Promise<StoryRecord[]> {
    const user = requireUser(this.identity, "listHistory");
    return this.listSorted(paths.history(user.uid), options);
  }

  async listFavorites(options?: CallOptions): Promise<StoryRecord[]> {
    const user = requireUser(this.identity, "listFavorites");
    return this.listSorted(paths.favorites(user.uid), options);
  }

  async listShared(partnershipId: string, options?: CallOptions): Promise<StoryRecord[]> {
    return this.listSorted(paths.sharedStories(partnershipId), options);
  }

  /** Delete every history copy except today's; returns how many went. */
  async clearHistory(options?: CallOptions): Promise<number> {
    const user = requireUser(this.identity, "clearHistory");
    const today = toDayKey(this.clock());
    const entries = await this.store.list(paths.history(user.uid), options);
    let removed = 0;
    for (const entry of entries) {
      if (entry.data.dayKey === today) continue;
      await this.store.remove(entry.path, options);
      removed += 1;
    }
    console.info(`[Daydreams] Cleared ${removed} history entries for ${user.uid}`);
    return removed;
  }

  watchShared(partnershipId: string, listener: (records: StoryRecord[]) => void): () => void {
    return this.store.subscribe(paths.sharedStories(partnershipId), (documents) => {
      const records: StoryRecord[] = [];
      for (const doc of documents) {
        const record = parseDocument(storyRecordSchema, doc.path, doc.data);
        if (record) records.push(record);
      }
      listener(records.sort(compareNewestFirst));
    });
  }

  /**
   * Show a local notification when the partner finishes a story. Stories
   * already complete when watching starts are not announced.
   */
  watchPartnerCompletions(partnership: Partnership, uid: string): () => void {
    const announced = new Set<string>();
    let primed = false;
    return this.watchShared(partnership.id, (records) => {
      for (const record of records) {
        if (!record.completedAt || announced.has(record.id)) continue;
        announced.add(record.id);
        const authorUid = userForSlot(partnership, record.assignedAuthor);
        if (!primed || authorUid === uid || !this.notifications) continue;
        const notifications = this.notifications;
        notifications
          .displayName(authorUid)
          .then((name) => notifications.notifyLocalCompletion(name))
          .catch((error: unknown) => console.warn("[Daydreams] Local completion notification failed", error));
      }
      primed = true;
    });
  }

  private async listSorted(collectionPath: string, options?: CallOptions): Promise<StoryRecord[]> {
    const records = await listTyped(this.store, storyRecordSchema, collectionPath, options);
    return records.sort(compareNewestFirst);
  }

  private async planMirrorWrites(
    uid: string,
    partnership: Partnership,
    sharedPath: string,
    sharedRaw: JsonObject,
    completed: StoryRecord,
    options?: CallOptions,
  ): Promise<MirrorWrite[]> {
    const writes: MirrorWrite[] = [{ target: "shared", path: sharedPath, previous: sharedRaw, next: completed }];

    const historyPath = paths.historyEntry(uid, completed.id);
    const historyRaw = await this.store.load(historyPath, options);
    const history = historyRaw ? parseDocument(storyRecordSchema, historyPath, historyRaw) : null;
    writes.push({
      target: "history",
      path: historyPath,
      previous: historyRaw,
      next: { ...completed, isFavorite: history?.isFavorite ?? false },
    });

    const partnerUid = partnerOf(partnership, uid);
    if (partnerUid) {
      const partnerPath = paths.historyEntry(partnerUid, completed.id);
      const partnerRaw = await this.store.load(partnerPath, options);
      const partnerHistory = partnerRaw ? parseDocument(storyRecordSchema, partnerPath, partnerRaw) : null;
      if (partnerRaw && partnerHistory) {
        writes.push({
          target: "partnerHistory",
          path: partnerPath,
          previous: partnerRaw,
          next: { ...completed, isFavorite: partnerHistory.isFavorite },
        });
      }
    }

    const favoritePath = paths.favorite(uid, completed.id);
    const favoriteRaw = await this.store.load(favoritePath, options);
    if (favoriteRaw) {
      writes.push({ target: "favorites", path: favoritePath, previous: favoriteRaw, next: { ...completed, isFavorite: true } });
    }
    return writes;
  }

  private async compensate(done: MirrorWrite[], partnershipId: string) {
    for (const write of done) {
      try {
        if (write.previous) await this.store.save(write.path, write.previous);
        else await this.store.remove(write.path);
      } catch (error) {
        console.warn(`[Daydreams] Could not restore ${write.path}`, error);
        this.telemetry({
          category: "mirror",
          code: "compensation_failed",
          reason: error instanceof Error ? error.message : "unknown",
          scope: partnershipId,
        });
      }
    }
  }
}
