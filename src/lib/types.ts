export const CATEGORIES = [
  "hotel",
  "park",
  "ride",
  "food",
  "beverage",
  "souvenir",
  "character",
  "event",
] as const;

export type Category = (typeof CATEGORIES)[number];

/** Category → chosen option text. Only enabled categories are present. */
export type CategoryItems = Partial<Record<Category, string>>;

export type CategoryCatalog = {
  version: string;
  options: Record<Category, string[]>;
};

/** The two members of a partnership: `first` invited, `second` accepted. */
export type AuthorSlot = "first" | "second";

export type StoryRecord = {
  id: string;
  partnershipId: string;
  dayKey: string;
  assignedAt: number;
  items: CategoryItems;
  assignedAuthor: AuthorSlot;
  storyText?: string;
  completedAt?: number;
  isFavorite: boolean;
};

export type Partnership = {
  id: string;
  user1Id: string;
  user2Id: string;
  createdAt: number;
  enabledCategories: Category[];
  sharedTripDate?: string;
  lastStoryDay?: string;
};

export type InvitationStatus = "pending" | "accepted" | "declined" | "expired";

export type Invitation = {
  code: string;
  fromUserId: string;
  fromDisplayName: string;
  toUserId?: string;
  status: InvitationStatus;
  createdAt: number;
  expiresAt: number;
};

export type UserProfile = {
  uid: string;
  email: string;
  displayName: string;
  partnershipId?: string;
  pushToken?: string;
};

export type StoryDraft = {
  storyId: string;
  text: string;
  savedAt: number;
};

export type SignedInUser = {
  uid: string;
  email: string;
};

/** Every async operation takes one of these so the caller can cancel it. */
export type CallOptions = {
  signal?: AbortSignal;
};
