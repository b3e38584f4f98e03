import { randomInt, randomUUID } from "node:crypto";
import { DEFAULT_CATEGORIES } from "./categories";
import { paths, type DocumentStore } from "./documentStore";
import { NotFoundError, ValidationError } from "./errors";
import { listTyped, loadTyped, updateTyped } from "./repository";
import { invitationRefSchema, invitationSchema, partnershipSchema, userProfileSchema } from "./schemas";
import { requireUser, type IdentityProvider } from "./session";
import { slotForUser } from "./turn";
import type { CallOptions, Invitation, Partnership, UserProfile } from "./types";
import { INVITATION_CODE_ALPHABET, validateDisplayName, validateInvitationCode } from "./validation";

export const INVITATION_TTL_MS = 7 * 24 * 60 * 60 * 1000;

export function generateInvitationCode(randomIndex: (max: number) => number = randomInt): string {
  let code = "";
  for (let i = 0; i < 6; i += 1) code += INVITATION_CODE_ALPHABET[randomIndex(INVITATION_CODE_ALPHABET.length)];
  return code;
}

export type PartnershipServiceDeps = {
  store: DocumentStore;
  identity: IdentityProvider;
  now?: () => number;
  newId?: () => string;
  newCode?: () => string;
};

export class PartnershipService {
  private readonly store: DocumentStore;
  private readonly identity: IdentityProvider;
  private readonly now: () => number;
  private readonly newId: () => string;
  private readonly newCode: () => string;

  constructor(deps: PartnershipServiceDeps) {
    this.store = deps.store;
    this.identity = deps.identity;
    this.now = deps.now ?? Date.now;
    this.newId = deps.newId ?? randomUUID;
    this.newCode = deps.newCode ?? (() => generateInvitationCode());
  }

  async getProfile(uid: string, options?: CallOptions): Promise<UserProfile | null> {
    return loadTyped(this.store, userProfileSchema, paths.user(uid), options);
  }

  /** Create or update the signed-in user's profile. */
  async saveProfile(
    changes: { displayName?: string; pushToken?: string },
    options?: CallOptions,
  ): Promise<UserProfile> {
    const user = requireUser(this.identity, "saveProfile");
    const displayName = changes.displayName === undefined ? undefined : validateDisplayName(changes.displayName);
    const saved = await updateTyped(
      this.store,
      userProfileSchema,
      paths.user(user.uid),
      (prev) => ({
        uid: user.uid,
        email: user.email,
        displayName: displayName ?? prev?.displayName ?? (user.email.split("@")[0] || user.uid),
        partnershipId: prev?.partnershipId,
        pushToken: changes.pushToken ?? prev?.pushToken,
      }),
      options,
    );
    if (!saved) throw new NotFoundError(`Profile ${user.uid}`);
    return saved;
  }

  async createInvitation(options?: CallOptions): Promise<Invitation> {
    const user = requireUser(this.identity, "createInvitation");
    const profile = await this.getProfile(user.uid, options);
    const createdAt = this.now();

    for (let attempt = 0; attempt < 5; attempt += 1) {
      const invitation: Invitation = {
        code: this.newCode(),
        fromUserId: user.uid,
        fromDisplayName: profile?.displayName ?? user.email,
        status: "pending",
        createdAt,
        expiresAt: createdAt + INVITATION_TTL_MS,
      };
      const { created } = await this.store.create(paths.invitation(invitation.code), invitation, options);
      if (created) {
        await this.store.save(
          paths.userInvitation(user.uid, invitation.code),
          { code: invitation.code, createdAt },
          options,
        );
        console.info(`[Daydreams] Invitation ${invitation.code} created by ${user.uid}`);
        return invitation;
      }
    }
    throw new Error("Could not allocate a unique invitation code");
  }

  async getInvitation(code: string, options?: CallOptions): Promise<Invitation | null> {
    return loadTyped(this.store, invitationSchema, paths.invitation(validateInvitationCode(code)), options);
  }

  /** Invitations the signed-in user has sent, newest first. */
  async getUserInvitations(options?: CallOptions): Promise<Invitation[]> {
    const user = requireUser(this.identity, "getUserInvitations");
    return this.invitationsFrom(user.uid, options);
  }

  /** Mark the signed-in user's pending invitations past their expiry as expired; returns how many. */
  async cleanupExpiredInvitations(options?: CallOptions): Promise<number> {
    const user = requireUser(this.identity, "cleanupExpiredInvitations");
    const now = this.now();
    let expired = 0;
    for (const invitation of await this.invitationsFrom(user.uid, options)) {
      if (invitation.status !== "pending" || invitation.expiresAt >= now) continue;
      await this.store.save(paths.invitation(invitation.code), { ...invitation, status: "expired" }, options);
      expired += 1;
    }
    if (expired > 0) console.info(`[Daydreams] Cleaned up ${expired} expired invitations for ${user.uid}`);
    return expired;
  }

  /**
   * Accept a pending invitation: the inviter becomes the first author, the
   * accepting user the second.
   */
  async acceptInvitation(code: string, options?: CallOptions): Promise<Partnership> {
    const user = requireUser(this.identity, "acceptInvitation");
    const invitation = await this.getInvitation(code, options);
    if (!invitation) throw new NotFoundError(`Invitation ${code}`);
    if (invitation.status !== "pending") throw new ValidationError("invalidInvitation", `status is ${invitation.status}`);
    if (invitation.expiresAt < this.now()) throw new ValidationError("invalidInvitation", "expired");
    if (invitation.fromUserId === user.uid) throw new ValidationError("invalidInvitation", "cannot accept your own invitation");

    const partnership: Partnership = {
      id: this.newId(),
      user1Id: invitation.fromUserId,
      user2Id: user.uid,
      createdAt: this.now(),
      enabledCategories: [...DEFAULT_CATEGORIES],
    };

    await this.store.save(
      paths.invitation(invitation.code),
      { ...invitation, status: "accepted", toUserId: user.uid },
      options,
    );
    await this.store.save(paths.partnership(partnership.id), partnership, options);
    await this.linkProfile(partnership.user1Id, partnership.id, options);
    await this.linkProfile(partnership.user2Id, partnership.id, options);
    console.info(`[Daydreams] Partnership ${partnership.id} created`);
    return partnership;
  }

  async declineInvitation(code: string, options?: CallOptions): Promise<void> {
    requireUser(this.identity, "declineInvitation");
    const invitation = await this.getInvitation(code, options);
    if (!invitation) throw new NotFoundError(`Invitation ${code}`);
    await this.store.save(paths.invitation(invitation.code), { ...invitation, status: "declined" }, options);
  }

  async getPartnership(partnershipId: string, options?: CallOptions): Promise<Partnership | null> {
    return loadTyped(this.store, partnershipSchema, paths.partnership(partnershipId), options);
  }

  async getPartnershipForUser(uid: string, options?: CallOptions): Promise<Partnership | null> {
    const profile = await this.getProfile(uid, options);
    if (!profile?.partnershipId) return null;
    return this.getPartnership(profile.partnershipId, options);
  }

  /** The signed-in user's partnership; throws when there is none. */
  async requirePartnership(operation: string, options?: CallOptions) {
    const user = requireUser(this.identity, operation);
    const partnership = await this.getPartnershipForUser(user.uid, options);
    if (!partnership) throw new NotFoundError(`Partnership for ${user.uid}`);
    return { user, partnership };
  }

  /** End a partnership the signed-in user belongs to and unlink both profiles. */
  async removePartnership(partnershipId: string, options?: CallOptions): Promise<void> {
    const user = requireUser(this.identity, "removePartnership");
    const partnership = await this.getPartnership(partnershipId, options);
    if (!partnership) return;
    if (!slotForUser(partnership, user.uid)) throw new NotFoundError(`Partnership ${partnershipId}`);
    await this.unlinkProfile(partnership.user1Id, partnershipId, options);
    await this.unlinkProfile(partnership.user2Id, partnershipId, options);
    await this.store.remove(paths.partnership(partnershipId), options);
  }

  /** Invitations sent by `uid`, found through their index under the user. */
  async invitationsFrom(uid: string, options?: CallOptions): Promise<Invitation[]> {
    const refs = await listTyped(this.store, invitationRefSchema, paths.userInvitations(uid), options);
    const invitations: Invitation[] = [];
    for (const ref of refs) {
      const invitation = await loadTyped(this.store, invitationSchema, paths.invitation(ref.code), options);
      if (invitation?.fromUserId === uid) invitations.push(invitation);
    }
    return invitations.sort((a, b) => b.createdAt - a.createdAt);
  }

  private async linkProfile(uid: string, partnershipId: string, options?: CallOptions) {
    await updateTyped(
      this.store,
      userProfileSchema,
      paths.user(uid),
      (prev) => ({
        uid,
        email: prev?.email ?? "",
        displayName: prev?.displayName ?? uid,
        pushToken: prev?.pushToken,
        partnershipId,
      }),
      options,
    );
  }

  private async unlinkProfile(uid: string, partnershipId: string, options?: CallOptions) {
    await updateTyped(
      this.store,
      userProfileSchema,
      paths.user(uid),
      (prev) => {
        if (!prev || prev.partnershipId !== partnershipId) return prev;
        return { ...prev, partnershipId: undefined };
      },
      options,
    );
  }
}
