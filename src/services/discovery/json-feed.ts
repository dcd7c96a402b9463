import { z } from "zod";

import type { JsonFeedTarget } from "../../config";
import { ParseError } from "../../shared/errors";
import { resolveServingDate } from "../../shared/dates";
import type { MenuDraft, MenuItem } from "../../shared/schemas";
import { decodeText, fetchRaw } from "./http";
import { resolveMealSlot } from "./normalize";
import type { DroppedDraft, FetchOptions, MenuSource, ParseContext, ParseResult, RawContent } from "./types";

// --- Feed Document Schemas ---
// Only the envelope is strict; entries are checked one by one so a single bad entry is dropped

const FeedEnvelopeSchema = z.object({
  menus: z.array(z.unknown()),
});

const FeedItemSchema = z.union([
  z.string(),
  z.object({
    name: z.string(),
    price: z.union([z.number(), z.string()]).optional(),
    tags: z.array(z.string()).optional(),
  }),
]);

const FeedEntrySchema = z.object({
  provider: z.string(),
  date: z.string(),
  meal: z.string().default(""),
  items: z.array(z.unknown()),
});

function parsePrice(value: number | string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (typeof value === "number") return Number.isFinite(value) && value >= 0 ? value : undefined;
  // "4,500원" -> 4500
  const digits = value.replace(/[^\d.]/g, "");
  const amount = Number(digits);
  return digits !== "" && Number.isFinite(amount) ? amount : undefined;
}

function toMenuItem(value: unknown): MenuItem | null {
  const parsed = FeedItemSchema.safeParse(value);
  if (!parsed.success) return null;
  if (typeof parsed.data === "string") {
    return parsed.data.trim() ? { name: parsed.data } : null;
  }
  if (!parsed.data.name.trim()) return null;

  const price = parsePrice(parsed.data.price);
  return {
    name: parsed.data.name,
    ...(price !== undefined ? { price } : {}),
    ...(parsed.data.tags ? { tags: parsed.data.tags } : {}),
  };
}

export class JsonFeedSource implements MenuSource<JsonFeedTarget> {
  public readonly type = "json-feed" as const;

  constructor(private readonly timeoutMs: number) {}

  async fetch(target: JsonFeedTarget, options: FetchOptions = {}): Promise<RawContent> {
    return fetchRaw({
      targetId: target.id,
      url: target.url,
      accept: ["application/json", "text/json"],
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    });
  }

  async parse(raw: RawContent, target: JsonFeedTarget, context: ParseContext): Promise<ParseResult> {
    const text = decodeText(raw).trim();
    if (text === "") return { drafts: [], dropped: [] };

    let document: unknown;
    try {
      document = JSON.parse(text);
    } catch {
      throw new ParseError("document", "a JSON document", `starts with "${text.slice(0, 40)}"`);
    }

    const envelope = FeedEnvelopeSchema.safeParse(document);
    if (!envelope.success) {
      throw new ParseError("root", "an object with a menus array");
    }

    const owned = new Set<string>(target.providerIds);
    const drafts: MenuDraft[] = [];
    const dropped: DroppedDraft[] = [];

    envelope.data.menus.forEach((value, index) => {
      const section = `menus[${index}]`;
      const entry = FeedEntrySchema.safeParse(value);
      if (!entry.success) {
        dropped.push({ section, reason: "entry needs provider, date and an items array" });
        return;
      }

      const { provider, date, meal, items } = entry.data;
      if (!owned.has(provider)) {
        dropped.push({ section, reason: `provider "${provider}" is not owned by target ${target.id}` });
        return;
      }

      const servingDate = resolveServingDate(date, context.referenceDate);
      if (!servingDate) {
        dropped.push({ section, reason: `unresolvable date "${date}"` });
        return;
      }

      const menuItems = items.map(toMenuItem).filter((item): item is MenuItem => item !== null);
      if (menuItems.length === 0) {
        dropped.push({ section, reason: "no items listed" });
        return;
      }

      drafts.push({
        providerId: provider,
        servingDate,
        mealSlot: resolveMealSlot(meal, target.slotRules),
        items: menuItems,
      });
    });

    return { drafts, dropped };
  }
}
