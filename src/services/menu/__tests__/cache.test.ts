import { beforeEach, describe, expect, it } from "vitest";

import type { MenuRecord } from "../../../shared/schemas";
import { ALL_PROVIDERS, MenuCache, buildSnapshot, type CacheKey } from "../cache";

const record: MenuRecord = {
  providerId: "P1",
  servingDate: "2024-05-01",
  mealSlot: "lunch",
  items: [{ name: "Rice" }],
  source: "crawled",
  contentHash: "a".repeat(64),
  lastUpdatedAt: "2024-05-01T00:00:00.000Z",
  version: 3,
};

const snapshot = buildSnapshot([record], new Date("2024-05-01T00:00:00.000Z"));
const week: CacheKey = { providerId: "P1", from: "2024-05-01", to: "2024-05-07" };

describe("buildSnapshot", () => {
  it("records the version of every menu it holds", () => {
    expect(snapshot).toEqual({
      records: [record],
      versions: { "P1|2024-05-01|lunch": 3 },
      builtAt: "2024-05-01T00:00:00.000Z",
    });
  });
});

describe("MenuCache", () => {
  let clock: number;
  let cache: MenuCache;

  beforeEach(() => {
    clock = 0;
    cache = new MenuCache({ maxEntries: 2, ttlMs: 1000, staleGraceMs: 500, now: () => clock });
  });

  it("serves fresh entries until the TTL passes", () => {
    cache.put(week, snapshot);

    clock = 999;
    expect(cache.get(week)).toEqual({ status: "fresh", snapshot });

    clock = 1000;
    expect(cache.get(week)).toEqual({ status: "expired", snapshot });
  });

  it("forgets entries once the grace window is over", () => {
    cache.put(week, snapshot);

    clock = 1500;

    expect(cache.get(week)).toEqual({ status: "miss" });
    expect(cache.size).toBe(0);
  });

  it("honours a per-entry TTL", () => {
    cache.put(week, snapshot, 10);
    clock = 10;

    expect(cache.get(week).status).toBe("expired");
  });

  it("evicts the least recently used entry", () => {
    const a: CacheKey = { providerId: "A", from: "2024-05-01", to: "2024-05-01" };
    const b: CacheKey = { providerId: "B", from: "2024-05-01", to: "2024-05-01" };
    const c: CacheKey = { providerId: "C", from: "2024-05-01", to: "2024-05-01" };
    cache.put(a, snapshot);
    cache.put(b, snapshot);
    cache.get(a);

    cache.put(c, snapshot);

    expect(cache.get(b).status).toBe("miss");
    expect(cache.get(a).status).toBe("fresh");
    expect(cache.get(c).status).toBe("fresh");
  });

  it("invalidates entries whose provider and range cover the menu", () => {
    const big = new MenuCache({ maxEntries: 10, ttlMs: 1000, staleGraceMs: 0, now: () => clock });
    const everyone: CacheKey = { providerId: ALL_PROVIDERS, from: "2024-04-29", to: "2024-05-03" };
    const otherProvider: CacheKey = { providerId: "P2", from: "2024-05-01", to: "2024-05-01" };
    const laterWeek: CacheKey = { providerId: "P1", from: "2024-05-08", to: "2024-05-14" };
    for (const key of [week, everyone, otherProvider, laterWeek]) big.put(key, snapshot);

    big.invalidate("P1", "2024-05-01");

    expect(big.get(week).status).toBe("miss");
    expect(big.get(everyone).status).toBe("miss");
    expect(big.get(otherProvider).status).toBe("fresh");
    expect(big.get(laterWeek).status).toBe("fresh");
  });

  it("drops a single key or everything", () => {
    cache.put(week, snapshot);
    cache.invalidateKey(week);
    expect(cache.size).toBe(0);

    cache.put(week, snapshot);
    cache.clear();
    expect(cache.get(week).status).toBe("miss");
  });
});
