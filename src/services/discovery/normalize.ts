import { createHash } from "crypto";

import type { SlotRules } from "../../config";
import type { MealSlot, MenuDraft, MenuItem, MenuKey } from "../../shared/schemas";

export function normalizeDishName(name: string): string {
  return name.normalize("NFC").replace(/\s+/g, " ").trim();
}

function foldName(name: string): string {
  return normalizeDishName(name).toLowerCase();
}

function normalizeTags(tags: string[] | undefined): string[] | undefined {
  if (!tags) return undefined;
  const cleaned = [...new Set(tags.map((tag) => foldName(tag)).filter((tag) => tag.length > 0))].sort();
  return cleaned.length > 0 ? cleaned : undefined;
}

// Code-unit order, not locale collation
function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareItems(a: MenuItem, b: MenuItem): number {
  const byName = compareText(foldName(a.name), foldName(b.name));
  if (byName !== 0) return byName;
  const byPrice = (a.price ?? -1) - (b.price ?? -1);
  if (byPrice !== 0) return byPrice;
  return compareText((a.tags ?? []).join(","), (b.tags ?? []).join(","));
}

/**
 * Canonical item list: cleaned names, folded tags, sorted, duplicates removed.
 * Items that differ only by case or whitespace collapse to one entry.
 */
export function normalizeItems(items: MenuItem[]): MenuItem[] {
  const cleaned: MenuItem[] = [];
  for (const item of items) {
    const name = normalizeDishName(item.name);
    if (!name) continue;
    const tags = normalizeTags(item.tags);
    cleaned.push({
      name,
      ...(item.price !== undefined ? { price: item.price } : {}),
      ...(tags ? { tags } : {}),
    });
  }

  cleaned.sort(compareItems);
  return cleaned.filter((item, index) => index === 0 || compareItems(cleaned[index - 1], item) !== 0);
}

/** SHA-256 over the canonical form. Callers pass already normalized items. */
export function contentHash(draft: MenuDraft): string {
  const canonical = JSON.stringify([
    draft.providerId,
    draft.servingDate,
    draft.mealSlot,
    draft.items.map((item) => [foldName(item.name), item.price ?? null, item.tags ?? []]),
  ]);
  return createHash("sha256").update(canonical).digest("hex");
}

export function normalizeDraft(draft: MenuDraft): MenuDraft {
  return { ...draft, items: normalizeItems(draft.items) };
}

export function menuKeyOf(value: MenuKey): MenuKey {
  return { providerId: value.providerId, servingDate: value.servingDate, mealSlot: value.mealSlot };
}

export function describeKey(key: MenuKey): string {
  return `${key.providerId}/${key.servingDate}/${key.mealSlot}`;
}

const TIME_OF_DAY = /(\d{1,2}):(\d{2})/;

/**
 * Explicit labels win (case-insensitive substring, longest label first); otherwise the
 * first HH:MM in the label is placed into an hour window; otherwise "other".
 */
export function resolveMealSlot(label: string, rules: SlotRules): MealSlot {
  const folded = foldName(label);
  const labels = Object.entries(rules.labels).sort(([a], [b]) => b.length - a.length);
  for (const [pattern, slot] of labels) {
    if (folded.includes(foldName(pattern))) return slot;
  }

  const time = TIME_OF_DAY.exec(label);
  if (time) {
    const hour = Number(time[1]) + Number(time[2]) / 60;
    const window = rules.hours.find((w) => hour >= w.from && hour < w.to);
    if (window) return window.slot;
  }
  return "other";
}
