import { z } from "zod";
import {
  CATEGORIES,
  type Category,
  type CategoryCatalog,
  type Invitation,
  type Partnership,
  type StoryDraft,
  type StoryRecord,
  type UserProfile,
} from "./types";

const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const categorySchema: z.ZodType<Category> = z.enum(CATEGORIES);

export const dayKeySchema = z.string().regex(DAY_KEY_PATTERN, "expected yyyy-MM-dd");

const optionListSchema = z.array(z.string().min(1)).min(1);

export const categoryCatalogSchema: z.ZodType<CategoryCatalog> = z.object({
  version: z.string(),
  options: z.object({
    hotel: optionListSchema,
    park: optionListSchema,
    ride: optionListSchema,
    food: optionListSchema,
    beverage: optionListSchema,
    souvenir: optionListSchema,
    character: optionListSchema,
    event: optionListSchema,
  }),
});

export const storyRecordSchema: z.ZodType<StoryRecord> = z.object({
  id: z.string().min(1),
  partnershipId: z.string().min(1),
  dayKey: dayKeySchema,
  assignedAt: z.number(),
  items: z.record(categorySchema, z.string()),
  assignedAuthor: z.enum(["first", "second"]),
  storyText: z.string().optional(),
  completedAt: z.number().optional(),
  isFavorite: z.boolean(),
});

export const partnershipSchema: z.ZodType<Partnership> = z.object({
  id: z.string().min(1),
  user1Id: z.string().min(1),
  user2Id: z.string().min(1),
  createdAt: z.number(),
  enabledCategories: z.array(categorySchema),
  sharedTripDate: dayKeySchema.optional(),
  lastStoryDay: dayKeySchema.optional(),
});

export const invitationSchema: z.ZodType<Invitation> = z.object({
  code: z.string().length(6),
  fromUserId: z.string().min(1),
  fromDisplayName: z.string(),
  toUserId: z.string().optional(),
  status: z.enum(["pending", "accepted", "declined", "expired"]),
  createdAt: z.number(),
  expiresAt: z.number(),
});

export const invitationRefSchema = z.object({
  code: z.string().length(6),
  createdAt: z.number(),
});

export const userProfileSchema: z.ZodType<UserProfile> = z.object({
  uid: z.string().min(1),
  email: z.string(),
  displayName: z.string(),
  partnershipId: z.string().optional(),
  pushToken: z.string().optional(),
});

export const storyDraftSchema: z.ZodType<StoryDraft> = z.object({
  storyId: z.string().min(1),
  text: z.string(),
  savedAt: z.number(),
});

/**
 * Parse a stored document, or `null` with a warning when it does not match.
 * Malformed documents are skipped rather than failing a whole listing.
 */
export function parseDocument<T>(schema: z.ZodType<T>, path: string, raw: unknown): T | null {
  const result = schema.safeParse(raw);
  if (result.success) return result.data;
  const issues = result.error.issues
    .map((issue) => `${issue.path.join(".") || "document"}: ${issue.message}`)
    .join("; ");
  console.warn(`[Daydreams] Skipping malformed document at ${path} (${issues})`);
  return null;
}
