import { afterEach, describe, expect, it, vi } from "vitest";

import { JsonFeedTargetSchema, type JsonFeedTarget } from "../../../config";
import { ParseError, SourceUnavailable } from "../../../shared/errors";
import { fetchRaw } from "../http";
import { JsonFeedSource } from "../json-feed";
import type { RawContent } from "../types";

const target: JsonFeedTarget = JsonFeedTargetSchema.parse({
  type: "json-feed",
  id: "partner",
  url: "https://feed.example.com/menus.json",
  providerIds: ["dorm", "library-cafe"],
  slotRules: {
    labels: { lunch: "lunch", dinner: "dinner" },
    hours: [{ from: 6, to: 10, slot: "breakfast" }],
  },
});

function jsonContent(text: string): RawContent {
  const bytes = new TextEncoder().encode(text);
  const body = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(body).set(bytes);
  return { url: target.url, contentType: "application/json", body, fetchedAt: "2024-04-29T00:00:00.000Z" };
}

const context = { referenceDate: "2024-04-29" };

describe("JsonFeedSource.parse", () => {
  const source = new JsonFeedSource(1000);

  it("keeps valid entries and drops the rest with a reason", async () => {
    const raw = jsonContent(
      JSON.stringify({
        menus: [
          {
            provider: "dorm",
            date: "2024-05-01",
            meal: "Lunch",
            items: ["Rice", { name: "Tonkatsu", price: "6,000원", tags: ["Pork"] }, "  "],
          },
          { provider: "dorm", date: "5/2", meal: "Breakfast 07:30-09:00", items: ["Toast"] },
          { provider: "elsewhere", date: "2024-05-01", items: ["Soup"] },
          { provider: "dorm", date: "someday", items: ["Soup"] },
          { provider: "library-cafe", date: "2024-05-01", meal: "Brunch", items: [] },
          "nonsense",
        ],
      })
    );

    const result = await source.parse(raw, target, context);

    expect(result.drafts).toEqual([
      {
        providerId: "dorm",
        servingDate: "2024-05-01",
        mealSlot: "lunch",
        items: [{ name: "Rice" }, { name: "Tonkatsu", price: 6000, tags: ["Pork"] }],
      },
      { providerId: "dorm", servingDate: "2024-05-02", mealSlot: "breakfast", items: [{ name: "Toast" }] },
    ]);
    expect(result.dropped).toEqual([
      { section: "menus[2]", reason: 'provider "elsewhere" is not owned by target partner' },
      { section: "menus[3]", reason: 'unresolvable date "someday"' },
      { section: "menus[4]", reason: "no items listed" },
      { section: "menus[5]", reason: "entry needs provider, date and an items array" },
    ]);
  });

  it("falls back to the other slot when no rule matches", async () => {
    const raw = jsonContent(JSON.stringify({ menus: [{ provider: "library-cafe", date: "2024-05-01", items: ["Bagel"] }] }));

    const result = await source.parse(raw, target, context);

    expect(result.drafts[0]?.mealSlot).toBe("other");
  });

  it("treats an empty document as no menu", async () => {
    await expect(source.parse(jsonContent("  \n"), target, context)).resolves.toEqual({ drafts: [], dropped: [] });
  });

  it("fails on a document that is not JSON", async () => {
    const error = await source.parse(jsonContent("<html>maintenance</html>"), target, context).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ParseError);
    expect(error).toMatchObject({
      section: "document",
      message: 'Unrecognized document: expected a JSON document (starts with "<html>maintenance</html>")',
    });
  });

  it("fails when the menus array is missing", async () => {
    await expect(source.parse(jsonContent('{"data": []}'), target, context)).rejects.toMatchObject({
      section: "root",
      expected: "an object with a menus array",
    });
  });
});

describe("fetchRaw", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const request = { targetId: "partner", url: "https://feed.example.com/menus.json", accept: ["application/json"], timeoutMs: 1000 };

  it("returns the body and content type", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response('{"menus":[]}', { headers: { "content-type": "application/json; charset=utf-8" } }))
    );

    const raw = await fetchRaw(request);

    expect(raw.contentType).toBe("application/json; charset=utf-8");
    expect(new TextDecoder().decode(raw.body)).toBe('{"menus":[]}');
  });

  it("reports non-2xx responses with their status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("oops", { status: 500, statusText: "Server Error" })));

    const error = await fetchRaw(request).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailable);
    expect(error).toMatchObject({
      status: 500,
      targetId: "partner",
      message: "HTTP 500 Server Error for https://feed.example.com/menus.json",
    });
  });

  it("rejects an unexpected content type", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<html></html>", { headers: { "content-type": "text/html" } })));

    await expect(fetchRaw(request)).rejects.toThrow(
      'Unexpected content type "text/html" for https://feed.example.com/menus.json'
    );
  });

  it("wraps network errors", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("fetch failed");
      })
    );

    await expect(fetchRaw(request)).rejects.toThrow("Request to https://feed.example.com/menus.json failed: fetch failed");
  });

  it("gives up after the timeout", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(
        (_input: string | URL | Request, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener("abort", () => reject(new Error("aborted")));
          })
      )
    );

    await expect(fetchRaw({ ...request, timeoutMs: 20 })).rejects.toThrow(
      "Request to https://feed.example.com/menus.json failed: timed out after 20ms"
    );
  });
});
