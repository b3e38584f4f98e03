import { CATEGORIES, type Category, type CategoryCatalog, type CategoryItems } from "./types";
import { CATEGORY_PREFIXES } from "./categories";

export type RandomSource = () => number;

/** Number of combinations: the product of the option list lengths. */
export function combinationCount(categories: readonly Category[], catalog: CategoryCatalog): number {
  return categories.reduce((count, category) => count * catalog.options[category].length, 1);
}

/**
 * The combination at `index` in cross-product order: the first category
 * varies slowest, the last fastest.
 */
export function combinationAt(categories: readonly Category[], catalog: CategoryCatalog, index: number): CategoryItems {
  const items: CategoryItems = {};
  let stride = combinationCount(categories, catalog);
  for (const category of categories) {
    const options = catalog.options[category];
    stride /= options.length;
    items[category] = options[Math.floor(index / stride) % options.length];
  }
  return items;
}

/** Fisher-Yates, in place. */
export function shuffle<T>(items: T[], random?: RandomSource): T[];
export function shuffle(items: Int32Array, random?: RandomSource): Int32Array;
export function shuffle<T>(items: { length: number; [index: number]: T }, random: RandomSource = Math.random) {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Shuffled, finite sequence of prompt combinations. `draw` walks the deck and
 * reshuffles once every combination has been handed out. Only a permutation
 * of indices is stored; each card is decoded when drawn.
 */
export class PromptDeck {
  readonly categories: readonly Category[];
  private readonly catalog: CategoryCatalog;
  private readonly order: Int32Array;
  private readonly random: RandomSource;
  private index = 0;

  constructor(categories: readonly Category[], catalog: CategoryCatalog, random: RandomSource = Math.random) {
    this.categories = [...categories];
    this.catalog = catalog;
    this.random = random;
    this.order = new Int32Array(combinationCount(this.categories, catalog));
    for (let i = 0; i < this.order.length; i += 1) this.order[i] = i;
    shuffle(this.order, random);
  }

  get size(): number {
    return this.order.length;
  }

  get remaining(): number {
    return this.order.length - this.index;
  }

  draw(): CategoryItems {
    if (this.order.length === 0) return {};
    if (this.index >= this.order.length) {
      shuffle(this.order, this.random);
      this.index = 0;
    }
    const card = this.order[this.index];
    this.index += 1;
    return combinationAt(this.categories, this.catalog, card);
  }

  /** True when this deck was built for exactly these categories, in this order. */
  matches(categories: readonly Category[]): boolean {
    return (
      categories.length === this.categories.length &&
      categories.every((category, i) => category === this.categories[i])
    );
  }
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

/** "Park: Magic Kingdom, Ride: Space Mountain" (sorted by category key). */
export function describePrompt(items: CategoryItems): string {
  return Object.entries(items)
    .filter((entry): entry is [string, string] => typeof entry[1] === "string")
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([category, option]) => `${capitalize(category)}: ${option}`)
    .join(", ");
}

/** "Visiting Magic Kingdom, Riding Space Mountain" (canonical category order). */
export function promptSentence(items: CategoryItems): string {
  const parts: string[] = [];
  for (const category of CATEGORIES) {
    const option = items[category];
    if (option) parts.push(`${CATEGORY_PREFIXES[category]} ${option}`);
  }
  return parts.join(", ");
}
