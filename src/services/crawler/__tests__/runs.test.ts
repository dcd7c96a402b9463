import Redis from "ioredis";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { StoreUnavailable } from "../../../shared/errors";
import type { CrawlRun } from "../../../shared/schemas";
import { MemoryCrawlRunStore, RedisCrawlRunStore } from "../runs";

function run(id: string, status: CrawlRun["status"] = "running"): CrawlRun {
  return {
    id,
    reason: "scheduled",
    status,
    startedAt: "2024-05-01T00:00:00.000Z",
    recordsSeen: 0,
    recordsChanged: 0,
    recordsSkipped: 0,
    recordsDropped: 0,
    targets: [],
  };
}

describe("MemoryCrawlRunStore", () => {
  it("lists the newest runs first", async () => {
    const runs = new MemoryCrawlRunStore();
    await runs.save(run("r1"));
    await runs.save(run("r2"));
    await runs.save({ ...run("r1", "finished"), outcome: "success", finishedAt: "2024-05-01T00:01:00.000Z" });

    const recent = await runs.recent(10);

    expect(recent.map((r) => r.id)).toEqual(["r2", "r1"]);
    expect(recent[1]?.status).toBe("finished");
  });

  it("retains only the configured number of runs", async () => {
    const runs = new MemoryCrawlRunStore(2);
    for (const id of ["r1", "r2", "r3"]) await runs.save(run(id));

    expect((await runs.recent(10)).map((r) => r.id)).toEqual(["r3", "r2"]);
    expect(await runs.get("r1")).toBeNull();
  });
});

describe("RedisCrawlRunStore", () => {
  let redis: Redis;
  let runs: RedisCrawlRunStore;

  beforeEach(() => {
    redis = new Redis({ lazyConnect: true });
    runs = new RedisCrawlRunStore(redis);
  });

  afterEach(() => {
    redis.disconnect();
  });

  it("reads recent runs by id and skips malformed entries", async () => {
    const lrange = vi.spyOn(redis, "lrange").mockResolvedValueOnce(["r2", "r1"]);
    const mget = vi.spyOn(redis, "mget").mockResolvedValueOnce([JSON.stringify(run("r2")), "{}"]);

    const recent = await runs.recent(5);

    expect(recent).toEqual([run("r2")]);
    expect(lrange).toHaveBeenCalledWith("meal:crawl-run:recent", 0, 4);
    expect(mget).toHaveBeenCalledWith(["meal:crawl-run:r2", "meal:crawl-run:r1"]);
  });

  it("saves when every queued command succeeds", async () => {
    const pipeline = redis.multi();
    vi.spyOn(redis, "multi").mockReturnValue(pipeline);
    const exec = vi.spyOn(pipeline, "exec").mockResolvedValue([
      [null, "OK"],
      [null, 1],
      [null, "OK"],
    ]);

    await runs.save(run("r1"));

    expect(exec).toHaveBeenCalledTimes(1);
  });

  it("fails the save when a queued command fails", async () => {
    const pipeline = redis.multi();
    vi.spyOn(redis, "multi").mockReturnValue(pipeline);
    vi.spyOn(pipeline, "exec").mockResolvedValue([
      [null, "OK"],
      [new Error("OOM command not allowed"), null],
      [null, "OK"],
    ]);

    const error = await runs.save(run("r1")).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreUnavailable);
    expect(error).toMatchObject({ message: "Saving crawl run r1 failed: OOM command not allowed" });
  });

  it("fails the save when the transaction is discarded", async () => {
    const pipeline = redis.multi();
    vi.spyOn(redis, "multi").mockReturnValue(pipeline);
    vi.spyOn(pipeline, "exec").mockResolvedValue(null);

    await expect(runs.save(run("r1", "finished"))).rejects.toThrow("Saving crawl run r1 failed: transaction discarded");
  });

  it("returns null for an unknown run", async () => {
    vi.spyOn(redis, "get").mockResolvedValueOnce(null);

    await expect(runs.get("missing")).resolves.toBeNull();
  });

  it("wraps read failures", async () => {
    vi.spyOn(redis, "get").mockRejectedValueOnce(new Error("ETIMEDOUT"));

    await expect(runs.get("r1")).rejects.toBeInstanceOf(StoreUnavailable);
  });
});
