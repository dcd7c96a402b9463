import Redis from "ioredis";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { StoreUnavailable } from "../../../shared/errors";
import type { MealSlot, MenuRecord } from "../../../shared/schemas";
import { RedisMenuStore, indexMember, recordKey } from "../redis-store";

function record(providerId: string, servingDate: string, mealSlot: MealSlot, version = 1): MenuRecord {
  return {
    providerId,
    servingDate,
    mealSlot,
    items: [{ name: "Rice" }],
    source: "crawled",
    contentHash: "0".repeat(64),
    lastUpdatedAt: "2024-04-30T00:00:00.000Z",
    version,
  };
}

describe("index members", () => {
  it("sort in date, provider, slot order", () => {
    const members = [
      indexMember(["2024-05-01", "P10", "breakfast"]),
      indexMember(["2024-05-02", "P1", "breakfast"]),
      indexMember(["2024-05-01", "P1", "other"]),
      indexMember(["2024-05-01", "P1", "lunch"]),
    ].sort();

    expect(members).toEqual(["2024-05-01 P1 1", "2024-05-01 P1 3", "2024-05-01 P10 0", "2024-05-02 P1 0"]);
  });

  it("keeps record keys readable", () => {
    expect(recordKey({ providerId: "vendor:kiosk", servingDate: "2024-05-01", mealSlot: "dinner" })).toBe(
      "meal:menu:vendor:kiosk:2024-05-01:dinner"
    );
  });
});

// Commands are stubbed on a client that never connects
describe("RedisMenuStore", () => {
  let redis: Redis;
  let store: RedisMenuStore;

  beforeEach(() => {
    redis = new Redis({ lazyConnect: true });
    store = new RedisMenuStore(redis);
  });

  afterEach(() => {
    redis.disconnect();
  });

  it("writes through the compare-and-set script", async () => {
    const evalSpy = vi.spyOn(redis, "eval").mockResolvedValue(1);
    const menu = record("P1", "2024-05-01", "lunch", 2);

    await expect(store.compareAndSet(menu, 1)).resolves.toBe(true);

    expect(evalSpy.mock.calls[0]?.slice(1)).toEqual([
      2,
      "meal:menu:P1:2024-05-01:lunch",
      "meal:menu:index",
      JSON.stringify(menu),
      "1",
      "2024-05-01 P1 1",
    ]);
  });

  it("passes -1 for an insert and reports a conflict as false", async () => {
    const evalSpy = vi.spyOn(redis, "eval").mockResolvedValue(0);

    await expect(store.compareAndSet(record("P1", "2024-05-01", "lunch"), null)).resolves.toBe(false);
    expect(evalSpy.mock.calls[0]?.[5]).toBe("-1");
  });

  it("decodes stored records and ignores malformed ones", async () => {
    const menu = record("P1", "2024-05-01", "lunch");
    vi.spyOn(redis, "get")
      .mockResolvedValueOnce(JSON.stringify(menu))
      .mockResolvedValueOnce("{not json")
      .mockResolvedValueOnce(JSON.stringify({ providerId: "P1" }));

    await expect(store.get(menu)).resolves.toEqual(menu);
    await expect(store.get(menu)).resolves.toBeNull();
    await expect(store.get(menu)).resolves.toBeNull();
  });

  it("lists from the index within the date range", async () => {
    const lunch = record("P1", "2024-05-01", "lunch");
    const dinner = record("P1", "2024-05-02", "dinner");
    const range = vi
      .spyOn(redis, "zrangebylex")
      .mockResolvedValueOnce(["2024-05-01 P1 1", "2024-05-01 P2 1", "2024-05-02 P1 2"]);
    const mget = vi.spyOn(redis, "mget").mockResolvedValueOnce([JSON.stringify(lunch), JSON.stringify(dinner)]);

    const records = await store.list({ providerId: "P1", from: "2024-05-01", to: "2024-05-02", limit: 10 });

    expect(records).toEqual([lunch, dinner]);
    expect(range).toHaveBeenCalledWith("meal:menu:index", "[2024-05-01", "(2024-05-02!", "LIMIT", 0, 200);
    expect(mget).toHaveBeenCalledWith(["meal:menu:P1:2024-05-01:lunch", "meal:menu:P1:2024-05-02:dinner"]);
  });

  it("starts after the page cursor", async () => {
    const range = vi.spyOn(redis, "zrangebylex").mockResolvedValueOnce([]);

    await expect(store.list({ after: ["2024-05-01", "P1", "lunch"], limit: 5 })).resolves.toEqual([]);
    expect(range).toHaveBeenCalledWith("meal:menu:index", "(2024-05-01 P1 1", "+", "LIMIT", 0, 200);
  });

  it("stops at the limit", async () => {
    vi.spyOn(redis, "zrangebylex").mockResolvedValueOnce(["2024-05-01 P1 1", "2024-05-01 P2 1"]);
    vi.spyOn(redis, "mget").mockResolvedValueOnce([
      JSON.stringify(record("P1", "2024-05-01", "lunch")),
      JSON.stringify(record("P2", "2024-05-01", "lunch")),
    ]);

    const records = await store.list({ limit: 1 });

    expect(records.map((r) => r.providerId)).toEqual(["P1"]);
  });

  it("surfaces connection failures as StoreUnavailable", async () => {
    vi.spyOn(redis, "get").mockRejectedValueOnce(new Error("ECONNREFUSED"));

    const error = await store.get(record("P1", "2024-05-01", "lunch")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailable);
    expect(error).toMatchObject({ message: "Redis get failed: ECONNREFUSED" });
  });
});
