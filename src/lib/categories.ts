import catalogJson from "../../data/categories.json";
import { categoryCatalogSchema } from "./schemas";
import { CATEGORIES, type Category, type CategoryCatalog } from "./types";

export const DEFAULT_CATEGORIES: readonly Category[] = ["park", "ride", "food"];

export const CATEGORY_PREFIXES: Record<Category, string> = {
  hotel: "Staying at",
  park: "Visiting",
  ride: "Riding",
  food: "Eating",
  beverage: "Drinking",
  souvenir: "Buying",
  character: "Meeting",
  event: "Attending",
};

export function parseCategoryCatalog(raw: unknown): CategoryCatalog {
  const result = categoryCatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`categories.json does not match the catalog schema: ${result.error.message}`);
  }
  return result.data;
}

let bundledCatalog: CategoryCatalog | null = null;

/** Option lists shipped with the package. */
export function getBundledCatalog(): CategoryCatalog {
  bundledCatalog ??= parseCategoryCatalog(catalogJson);
  return bundledCatalog;
}

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

/**
 * De-duplicate and sort into canonical order. An empty selection reverts to
 * the defaults, so a partnership always has at least one category.
 */
export function normalizeCategories(categories: readonly Category[]): Category[] {
  const selected = CATEGORIES.filter((category) => categories.includes(category));
  return selected.length > 0 ? selected : [...DEFAULT_CATEGORIES];
}
