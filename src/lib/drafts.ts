import { paths, type DocumentStore } from "./documentStore";
import { listTyped, loadTyped } from "./repository";
import { storyDraftSchema } from "./schemas";
import type { CallOptions, StoryDraft } from "./types";

export const DRAFT_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export class DraftService {
  private readonly now: () => number;

  constructor(
    private readonly store: DocumentStore,
    now: () => number = Date.now,
  ) {
    this.now = now;
  }

  async saveDraft(uid: string, storyId: string, text: string, options?: CallOptions): Promise<StoryDraft> {
    const draft: StoryDraft = { storyId, text, savedAt: this.now() };
    await this.store.save(paths.draft(uid, storyId), draft, options);
    return draft;
  }

  /** The draft's text, or `null` when missing or older than the retention window. */
  async loadDraft(uid: string, storyId: string, options?: CallOptions): Promise<string | null> {
    const draft = await loadTyped(this.store, storyDraftSchema, paths.draft(uid, storyId), options);
    if (!draft) return null;
    if (this.isExpired(draft)) {
      await this.deleteDraft(uid, storyId, options);
      return null;
    }
    return draft.text;
  }

  async deleteDraft(uid: string, storyId: string, options?: CallOptions): Promise<void> {
    await this.store.remove(paths.draft(uid, storyId), options);
  }

  /** Delete expired drafts; returns how many were removed. */
  async cleanupOldDrafts(uid: string, options?: CallOptions): Promise<number> {
    const drafts = await listTyped(this.store, storyDraftSchema, paths.drafts(uid), options);
    let removed = 0;
    for (const draft of drafts) {
      if (!this.isExpired(draft)) continue;
      await this.deleteDraft(uid, draft.storyId, options);
      removed += 1;
    }
    return removed;
  }

  private isExpired(draft: StoryDraft): boolean {
    return this.now() - draft.savedAt > DRAFT_TTL_MS;
  }
}
