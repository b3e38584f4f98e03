import { daysBetween } from "./calendar";
import { DEFAULT_CATEGORIES, normalizeCategories } from "./categories";
import { paths, type DocumentStore } from "./documentStore";
import { NotFoundError, ValidationError } from "./errors";
import { loadTyped, updateTyped } from "./repository";
import { dayKeySchema, partnershipSchema } from "./schemas";
import { requireUser, type IdentityProvider } from "./session";
import { slotForUser } from "./turn";
import type { CallOptions, Category, Partnership } from "./types";

export type PartnershipSettings = {
  enabledCategories: Category[];
  tripDate: string | null;
};

export function settingsOf(partnership: Partnership | null): PartnershipSettings {
  if (!partnership) return { enabledCategories: [...DEFAULT_CATEGORIES], tripDate: null };
  return {
    enabledCategories: normalizeCategories(partnership.enabledCategories),
    tripDate: partnership.sharedTripDate ?? null,
  };
}

/** Calendar days left until the trip, or `null` without a trip date. */
export function daysUntilTrip(tripDate: string | null, today: string): number | null {
  if (!tripDate) return null;
  return daysBetween(today, tripDate);
}

export function showTripCountdown(tripDate: string | null, today: string): boolean {
  const days = daysUntilTrip(tripDate, today);
  return days !== null && days > 0;
}

export type SettingsServiceDeps = {
  store: DocumentStore;
  identity: IdentityProvider;
};

/** Partnership-wide settings; only a signed-in member may read or change them. */
export class SettingsService {
  private readonly store: DocumentStore;
  private readonly identity: IdentityProvider;

  constructor(deps: SettingsServiceDeps) {
    this.store = deps.store;
    this.identity = deps.identity;
  }

  async getSettings(partnershipId: string, options?: CallOptions): Promise<PartnershipSettings> {
    return settingsOf(await this.requireMembership("getSettings", partnershipId, options));
  }

  async setEnabledCategories(
    partnershipId: string,
    categories: readonly Category[],
    options?: CallOptions,
  ): Promise<PartnershipSettings> {
    await this.requireMembership("setEnabledCategories", partnershipId, options);
    const enabledCategories = normalizeCategories(categories);
    if (categories.length === 0) {
      console.warn("[Daydreams] No categories enabled, reverting to defaults");
    }
    const updated = await this.updatePartnership(partnershipId, (prev) => ({ ...prev, enabledCategories }), options);
    return settingsOf(updated);
  }

  async setTripDate(partnershipId: string, tripDate: string | null, options?: CallOptions): Promise<PartnershipSettings> {
    await this.requireMembership("setTripDate", partnershipId, options);
    if (tripDate !== null && !dayKeySchema.safeParse(tripDate).success) {
      throw new ValidationError("invalidDate", tripDate);
    }
    const sharedTripDate = tripDate ?? undefined;
    const updated = await this.updatePartnership(partnershipId, (prev) => ({ ...prev, sharedTripDate }), options);
    return settingsOf(updated);
  }

  /**
   * The partnership, once the signed-in user is confirmed as a member.
   * Outsiders get the same {@link NotFoundError} as a missing partnership.
   */
  private async requireMembership(operation: string, partnershipId: string, options?: CallOptions) {
    const user = requireUser(this.identity, operation);
    const partnership = await loadTyped(this.store, partnershipSchema, paths.partnership(partnershipId), options);
    if (!partnership || !slotForUser(partnership, user.uid)) throw new NotFoundError(`Partnership ${partnershipId}`);
    return partnership;
  }

  private async updatePartnership(
    partnershipId: string,
    change: (prev: Partnership) => Partnership,
    options?: CallOptions,
  ): Promise<Partnership> {
    const updated = await updateTyped(
      this.store,
      partnershipSchema,
      paths.partnership(partnershipId),
      (prev) => (prev ? change(prev) : null),
      options,
    );
    if (!updated) throw new NotFoundError(`Partnership ${partnershipId}`);
    return updated;
  }
}
