import type Redis from "ioredis";

import { scopedLogger } from "../../infra/logger";
import { StoreUnavailable, describeError } from "../../shared/errors";
import { CrawlRunSchema, type CrawlRun } from "../../shared/schemas";

const log = scopedLogger("SERVICE", "RUN-LOG");

/**
 * Crawl run history. A run is written once at start and once when finalized.
 */
export interface CrawlRunStore {
  save(run: CrawlRun): Promise<void>;
  get(id: string): Promise<CrawlRun | null>;
  recent(limit: number): Promise<CrawlRun[]>;
}

export class MemoryCrawlRunStore implements CrawlRunStore {
  private runs = new Map<string, CrawlRun>();
  private order: string[] = [];

  constructor(private readonly retain = 50) {}

  async save(run: CrawlRun): Promise<void> {
    if (!this.runs.has(run.id)) {
      this.order.unshift(run.id);
      for (const dropped of this.order.splice(this.retain)) this.runs.delete(dropped);
    }
    this.runs.set(run.id, structuredClone(run));
  }

  async get(id: string): Promise<CrawlRun | null> {
    const run = this.runs.get(id);
    return run ? structuredClone(run) : null;
  }

  async recent(limit: number): Promise<CrawlRun[]> {
    return this.order.slice(0, limit).flatMap((id) => {
      const run = this.runs.get(id);
      return run ? [structuredClone(run)] : [];
    });
  }
}

const RUN_PREFIX = "meal:crawl-run";
const RECENT_KEY = `${RUN_PREFIX}:recent`;
const RUN_TTL_SECONDS = 7 * 24 * 60 * 60; // 7 days

export class RedisCrawlRunStore implements CrawlRunStore {
  constructor(private readonly redis: Redis, private readonly retain = 50) {}

  async save(run: CrawlRun): Promise<void> {
    const multi = this.redis.multi().set(`${RUN_PREFIX}:${run.id}`, JSON.stringify(run), "EX", RUN_TTL_SECONDS);
    if (run.status === "running") {
      multi.lpush(RECENT_KEY, run.id).ltrim(RECENT_KEY, 0, this.retain - 1);
    }
    let results: [Error | null, unknown][] | null;
    try {
      results = await multi.exec();
    } catch (error) {
      throw new StoreUnavailable(`Saving crawl run ${run.id} failed: ${describeError(error)}`, { cause: error });
    }
    // exec resolves even when single commands fail; null means the transaction was discarded
    const failure = results === null ? new Error("transaction discarded") : results.find(([error]) => error !== null)?.[0];
    if (failure) {
      throw new StoreUnavailable(`Saving crawl run ${run.id} failed: ${failure.message}`, { cause: failure });
    }
  }

  async get(id: string): Promise<CrawlRun | null> {
    let raw: string | null;
    try {
      raw = await this.redis.get(`${RUN_PREFIX}:${id}`);
    } catch (error) {
      throw new StoreUnavailable(`Reading crawl run ${id} failed: ${describeError(error)}`, { cause: error });
    }
    return raw === null ? null : decodeRun(raw);
  }

  async recent(limit: number): Promise<CrawlRun[]> {
    try {
      const ids = await this.redis.lrange(RECENT_KEY, 0, limit - 1);
      if (ids.length === 0) return [];
      const raws = await this.redis.mget(ids.map((id) => `${RUN_PREFIX}:${id}`));
      return raws.flatMap((raw) => {
        const run = raw === null ? null : decodeRun(raw);
        return run ? [run] : [];
      });
    } catch (error) {
      throw new StoreUnavailable(`Listing crawl runs failed: ${describeError(error)}`, { cause: error });
    }
  }
}

function decodeRun(raw: string): CrawlRun | null {
  try {
    return CrawlRunSchema.parse(JSON.parse(raw));
  } catch (error) {
    log.warn({ error: describeError(error) }, "Ignoring malformed crawl run");
    return null;
  }
}
