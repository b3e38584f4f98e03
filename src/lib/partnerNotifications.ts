import { describePrompt } from "./deck";
import { paths, type DocumentStore } from "./documentStore";
import {
  consoleNotifier,
  disabledPushGateway,
  messages,
  type LocalNotifier,
  type PushGateway,
} from "./notifications";
import { loadTyped } from "./repository";
import { userProfileSchema } from "./schemas";
import { noopTelemetry, type TelemetryReporter } from "./telemetry";
import { partnerOf, userForSlot } from "./turn";
import type { CallOptions, Partnership, StoryRecord } from "./types";

type OutgoingMessage = {
  content: { title: string; body: string };
  data: Record<string, string>;
};

export type NotificationServiceDeps = {
  store: DocumentStore;
  push?: PushGateway;
  local?: LocalNotifier;
  telemetry?: TelemetryReporter;
};

/**
 * Tells the other member of a partnership about new prompts and finished
 * stories. Lookup and delivery failures are logged and reported, never
 * thrown; an aborted call still rejects.
 */
export class NotificationService {
  private readonly store: DocumentStore;
  private readonly push: PushGateway;
  private readonly local: LocalNotifier;
  private readonly telemetry: TelemetryReporter;

  constructor(deps: NotificationServiceDeps) {
    this.store = deps.store;
    this.push = deps.push ?? disabledPushGateway;
    this.local = deps.local ?? consoleNotifier;
    this.telemetry = deps.telemetry ?? noopTelemetry;
  }

  async displayName(uid: string, options?: CallOptions): Promise<string> {
    const profile = await loadTyped(this.store, userProfileSchema, paths.user(uid), options);
    return profile?.displayName ?? uid;
  }

  notifyPartnerOfNewPrompt(
    partnership: Partnership,
    senderUid: string,
    record: StoryRecord,
    options?: CallOptions,
  ): Promise<boolean> {
    return this.sendToPartner(partnership, senderUid, "new_prompt", options, async () => {
      const authorName = await this.displayName(userForSlot(partnership, record.assignedAuthor), options);
      return {
        content: messages.newPrompt(authorName, describePrompt(record.items)),
        data: { type: "new_prompt", dayKey: record.dayKey },
      };
    });
  }

  notifyPartnerOfStoryCompletion(
    partnership: Partnership,
    authorUid: string,
    record: StoryRecord,
    options?: CallOptions,
  ): Promise<boolean> {
    return this.sendToPartner(partnership, authorUid, "story_completed", options, async () => {
      const authorName = await this.displayName(authorUid, options);
      return {
        content: messages.storyCompleted(authorName),
        data: { type: "story_completed", author: authorName, prompt: describePrompt(record.items) },
      };
    });
  }

  async notifyLocalCompletion(authorName: string): Promise<void> {
    await this.local.show(messages.localCompletion(authorName));
  }

  /** Lookups and delivery share one guard; only an abort propagates. */
  private async sendToPartner(
    partnership: Partnership,
    senderUid: string,
    kind: string,
    options: CallOptions | undefined,
    compose: () => Promise<OutgoingMessage>,
  ): Promise<boolean> {
    const partnerUid = partnerOf(partnership, senderUid);
    if (!partnerUid) {
      console.warn(`[Daydreams] ${senderUid} is not a member of partnership ${partnership.id}`);
      return false;
    }
    try {
      const partner = await loadTyped(this.store, userProfileSchema, paths.user(partnerUid), options);
      if (!partner?.pushToken) {
        console.warn(`[Daydreams] No push token for ${partnerUid}, skipping "${kind}" notification`);
        return false;
      }
      const { content, data } = await compose();
      await this.push.send({ token: partner.pushToken, ...content, data }, options);
      return true;
    } catch (error) {
      if (options?.signal?.aborted) throw error;
      console.warn(`[Daydreams] Failed to notify ${partnerUid}`, error);
      this.telemetry({
        category: "notify",
        code: "push_failed",
        reason: error instanceof Error ? error.message : "unknown",
        scope: partnership.id,
      });
      return false;
    }
  }
}
