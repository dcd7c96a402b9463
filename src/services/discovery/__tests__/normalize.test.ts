import { describe, expect, it } from "vitest";

import type { SlotRules } from "../../../config";
import type { MenuDraft } from "../../../shared/schemas";
import { contentHash, normalizeDraft, normalizeItems, resolveMealSlot } from "../normalize";

const draft = (names: string[]): MenuDraft => ({
  providerId: "P1",
  servingDate: "2024-05-01",
  mealSlot: "lunch",
  items: names.map((name) => ({ name })),
});

describe("normalizeItems", () => {
  it("cleans names, folds tags, sorts and drops duplicates", () => {
    const items = normalizeItems([
      { name: "  Rice " },
      { name: "Bulgogi", tags: ["Spicy", "spicy", " "] },
      { name: "rice" },
      { name: "   " },
    ]);

    expect(items).toEqual([{ name: "Bulgogi", tags: ["spicy"] }, { name: "Rice" }]);
  });

  it("keeps prices and orders same-named items by price", () => {
    expect(normalizeItems([{ name: "Ramen", price: 4500 }, { name: "ramen", price: 3500 }])).toEqual([
      { name: "ramen", price: 3500 },
      { name: "Ramen", price: 4500 },
    ]);
  });
});

describe("contentHash", () => {
  it("is equal for drafts that differ only in whitespace, case and order", () => {
    const a = normalizeDraft(draft([" Kimchi  Stew", "Rice"]));
    const b = normalizeDraft(draft(["rice", "kimchi stew"]));

    expect(contentHash(a)).toBe(contentHash(b));
    expect(contentHash(a)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes with items, slot and provider", () => {
    const base = normalizeDraft(draft(["A", "B"]));

    expect(contentHash(normalizeDraft(draft(["A", "B", "C"])))).not.toBe(contentHash(base));
    expect(contentHash({ ...base, mealSlot: "dinner" })).not.toBe(contentHash(base));
    expect(contentHash({ ...base, providerId: "P2" })).not.toBe(contentHash(base));
  });
});

describe("resolveMealSlot", () => {
  const rules: SlotRules = {
    labels: { 중식: "lunch", 석식: "dinner", dinner: "dinner", "late dinner": "other" },
    hours: [
      { from: 5, to: 10.5, slot: "breakfast" },
      { from: 10.5, to: 15, slot: "lunch" },
      { from: 16, to: 21, slot: "dinner" },
    ],
  };

  it("prefers explicit labels, longest first", () => {
    expect(resolveMealSlot("중식", rules)).toBe("lunch");
    expect(resolveMealSlot("Dinner Buffet", rules)).toBe("dinner");
    expect(resolveMealSlot("Late Dinner", rules)).toBe("other");
  });

  it("falls back to the time of day", () => {
    expect(resolveMealSlot("Set A 07:30-09:00", rules)).toBe("breakfast");
    expect(resolveMealSlot("Counter 11:30", rules)).toBe("lunch");
    expect(resolveMealSlot("17:30", rules)).toBe("dinner");
  });

  it("uses other when nothing matches", () => {
    expect(resolveMealSlot("Snack bar", rules)).toBe("other");
    expect(resolveMealSlot("15:30", rules)).toBe("other");
    expect(resolveMealSlot("Lunch", { labels: {}, hours: [] })).toBe("other");
  });
});
