import { describe, expect, it } from "vitest";
import { getBundledCatalog, isCategory, normalizeCategories, parseCategoryCatalog } from "./categories";

describe("category catalog", () => {
  it("ships option lists for every category", () => {
    const catalog = getBundledCatalog();

    expect(catalog.options.park).toEqual(["Magic Kingdom", "Epcot", "Hollywood Studios", "Animal Kingdom"]);
    expect(catalog.options.ride).toHaveLength(24);
    expect(getBundledCatalog()).toBe(catalog);
  });

  it("rejects a catalog with an empty list", () => {
    const broken = { version: "x", options: { ...getBundledCatalog().options, food: [] } };

    expect(() => parseCategoryCatalog(broken)).toThrow("categories.json does not match the catalog schema");
  });
});

describe("normalizeCategories", () => {
  it("sorts into canonical order without duplicates", () => {
    expect(normalizeCategories(["event", "park", "event", "hotel"])).toEqual(["hotel", "park", "event"]);
  });

  it("reverts an empty selection to the defaults", () => {
    expect(normalizeCategories([])).toEqual(["park", "ride", "food"]);
  });
});

describe("isCategory", () => {
  it("recognises known keys only", () => {
    expect(isCategory("souvenir")).toBe(true);
    expect(isCategory("weather")).toBe(false);
  });
});
