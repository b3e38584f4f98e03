import type { AuthorSlot, Partnership, StoryRecord } from "./types";

export const DEFAULT_AUTHOR: AuthorSlot = "first";

/** The other author, or {@link DEFAULT_AUTHOR} when nobody has written yet. */
export function nextAuthor(last?: AuthorSlot | null): AuthorSlot {
  if (!last) return DEFAULT_AUTHOR;
  return last === "first" ? "second" : "first";
}

export function slotForUser(partnership: Partnership, uid: string): AuthorSlot | null {
  if (partnership.user1Id === uid) return "first";
  if (partnership.user2Id === uid) return "second";
  return null;
}

export function userForSlot(partnership: Partnership, slot: AuthorSlot): string {
  return slot === "first" ? partnership.user1Id : partnership.user2Id;
}

export function partnerOf(partnership: Partnership, uid: string): string | null {
  const slot = slotForUser(partnership, uid);
  if (!slot) return null;
  return userForSlot(partnership, nextAuthor(slot));
}

export function isUsersTurn(record: StoryRecord | null, partnership: Partnership, uid: string): boolean {
  if (!record) return false;
  return slotForUser(partnership, uid) === record.assignedAuthor;
}
