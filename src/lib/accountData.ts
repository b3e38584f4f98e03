import { systemClock, type Clock } from "./calendar";
import { compareNewestFirst } from "./dailyPrompt";
import { describePrompt } from "./deck";
import { paths, type DocumentStore } from "./documentStore";
import { NotFoundError } from "./errors";
import type { PartnershipService } from "./partnerships";
import { listTyped, loadTyped } from "./repository";
import { storyRecordSchema, userProfileSchema } from "./schemas";
import { requireUser, type IdentityProvider } from "./session";
import { settingsOf, type PartnershipSettings } from "./settings";
import { partnerOf } from "./turn";
import type { CallOptions, Invitation, StoryRecord } from "./types";

export type ExportedStory = {
  id: string;
  partnershipId: string;
  dayKey: string;
  prompt: string;
  text: string;
  completedAt: string | null;
  isFavorite: boolean;
};

export type ExportedPartnership = {
  id: string;
  user1Id: string;
  user2Id: string;
  createdAt: string;
  partnerDisplayName: string | null;
  settings: PartnershipSettings;
};

export type UserDataExport = {
  exportedAt: string;
  profile: { uid: string; email: string; displayName: string };
  stories: ExportedStory[];
  partnerships: ExportedPartnership[];
  invitations: Invitation[];
};

export type DeletedUserData = {
  stories: number;
  favorites: number;
  drafts: number;
  invitations: number;
  partnershipId: string | null;
};

export type AccountDataServiceDeps = {
  store: DocumentStore;
  identity: IdentityProvider;
  partnerships: PartnershipService;
  clock?: Clock;
};

function toIso(ms: number): string {
  return new Date(ms).toISOString();
}

function exportStory(record: StoryRecord, isFavorite: boolean): ExportedStory {
  return {
    id: record.id,
    partnershipId: record.partnershipId,
    dayKey: record.dayKey,
    prompt: describePrompt(record.items),
    text: record.storyText ?? "",
    completedAt: record.completedAt === undefined ? null : toIso(record.completedAt),
    isFavorite,
  };
}

/** Export and erase everything stored for the signed-in user. */
export class AccountDataService {
  private readonly store: DocumentStore;
  private readonly identity: IdentityProvider;
  private readonly partnerships: PartnershipService;
  private readonly clock: Clock;

  constructor(deps: AccountDataServiceDeps) {
    this.store = deps.store;
    this.identity = deps.identity;
    this.partnerships = deps.partnerships;
    this.clock = deps.clock ?? systemClock;
  }

  async exportUserData(options?: CallOptions): Promise<UserDataExport> {
    const user = requireUser(this.identity, "exportUserData");
    const profile = await loadTyped(this.store, userProfileSchema, paths.user(user.uid), options);
    if (!profile) throw new NotFoundError(`Profile ${user.uid}`);

    const history = await listTyped(this.store, storyRecordSchema, paths.history(user.uid), options);
    const favorites = await listTyped(this.store, storyRecordSchema, paths.favorites(user.uid), options);
    const favoriteIds = new Set(favorites.map((record) => record.id));
    const byId = new Map<string, StoryRecord>();
    for (const record of [...favorites, ...history]) byId.set(record.id, record);
    const stories = [...byId.values()]
      .sort(compareNewestFirst)
      .map((record) => exportStory(record, favoriteIds.has(record.id)));

    const partnerships: ExportedPartnership[] = [];
    const partnership = profile.partnershipId
      ? await this.partnerships.getPartnership(profile.partnershipId, options)
      : null;
    if (partnership) {
      const partnerUid = partnerOf(partnership, user.uid);
      const partner = partnerUid ? await this.partnerships.getProfile(partnerUid, options) : null;
      partnerships.push({
        id: partnership.id,
        user1Id: partnership.user1Id,
        user2Id: partnership.user2Id,
        createdAt: toIso(partnership.createdAt),
        partnerDisplayName: partner?.displayName ?? null,
        settings: settingsOf(partnership),
      });
    }

    return {
      exportedAt: this.clock().toISOString(),
      profile: { uid: profile.uid, email: profile.email, displayName: profile.displayName },
      stories,
      partnerships,
      invitations: await this.partnerships.invitationsFrom(user.uid, options),
    };
  }

  /**
   * Remove the user's copies, drafts, invitations, partnership and profile.
   * The partner keeps their own history copies.
   */
  async deleteUserData(options?: CallOptions): Promise<DeletedUserData> {
    const user = requireUser(this.identity, "deleteUserData");
    const profile = await loadTyped(this.store, userProfileSchema, paths.user(user.uid), options);

    const stories = await this.removeAll(paths.history(user.uid), options);
    const favorites = await this.removeAll(paths.favorites(user.uid), options);
    const drafts = await this.removeAll(paths.drafts(user.uid), options);

    const invitations = await this.partnerships.invitationsFrom(user.uid, options);
    for (const invitation of invitations) await this.store.remove(paths.invitation(invitation.code), options);
    await this.removeAll(paths.userInvitations(user.uid), options);

    const partnershipId = profile?.partnershipId ?? null;
    if (partnershipId) {
      await this.removeAll(paths.sharedStories(partnershipId), options);
      await this.partnerships.removePartnership(partnershipId, options);
    }
    await this.store.remove(paths.user(user.uid), options);

    console.info(`[Daydreams] Deleted account data for ${user.uid}`);
    return { stories, favorites, drafts, invitations: invitations.length, partnershipId };
  }

  private async removeAll(collectionPath: string, options?: CallOptions): Promise<number> {
    const documents = await this.store.list(collectionPath, options);
    for (const doc of documents) await this.store.remove(doc.path, options);
    return documents.length;
  }
}
