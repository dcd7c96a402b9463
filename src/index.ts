import { createApp } from "./app";
import { loadConfig, loadTargets } from "./config";
import { logger, scopedLogger } from "./infra/logger";
import { closeRedisClient, createRedisClient } from "./infra/redis";
import { createSourceRegistry } from "./services/discovery/sources";
import { MemoryCrawlRunStore, RedisCrawlRunStore, type CrawlRunStore } from "./services/crawler/runs";
import { CrawlScheduler } from "./services/crawler/scheduler";
import { MenuCache } from "./services/menu/cache";
import { MemoryMenuStore } from "./services/menu/memory-store";
import { QueryService } from "./services/menu/query";
import { Reconciler } from "./services/menu/reconciler";
import { RedisMenuStore } from "./services/menu/redis-store";
import type { MenuStore } from "./services/menu/store";
import { VendorMenuService } from "./services/menu/vendor";

const log = scopedLogger("CORE");

async function main(): Promise<void> {
  const config = loadConfig();
  const targets = await loadTargets(config.TARGETS_FILE);

  const redis = config.REDIS_URL ? createRedisClient(config.REDIS_URL) : null;
  let store: MenuStore;
  let runs: CrawlRunStore;
  if (redis) {
    store = new RedisMenuStore(redis);
    runs = new RedisCrawlRunStore(redis);
  } else {
    log.warn("REDIS_URL is not set. Menus and crawl runs are kept in memory only.");
    store = new MemoryMenuStore();
    runs = new MemoryCrawlRunStore();
  }

  const cache = new MenuCache({
    maxEntries: config.CACHE_MAX_ENTRIES,
    ttlMs: config.CACHE_TTL_MS,
    staleGraceMs: config.CACHE_STALE_GRACE_MS,
  });

  const scheduler = new CrawlScheduler({
    targets,
    sources: createSourceRegistry(config.FETCH_TIMEOUT_MS),
    reconciler: new Reconciler(store, cache),
    runs,
    cache,
    intervalMs: config.CRAWL_INTERVAL_MS,
    runDeadlineMs: config.CRAWL_RUN_DEADLINE_MS,
    timeZone: config.TIMEZONE,
  });

  const app = createApp({
    query: new QueryService(store, cache, {
      timeZone: config.TIMEZONE,
      defaultPageSize: config.PAGE_SIZE_DEFAULT,
      maxPageSize: config.PAGE_SIZE_MAX,
      maxCachedSpanDays: config.CACHE_MAX_SPAN_DAYS,
    }),
    scheduler,
    vendors: new VendorMenuService(store, cache),
    vendorToken: config.VENDOR_API_TOKEN,
  });

  const server = app.listen(config.PORT, () => {
    log.info(`Campus Meal Service is running on port ${config.PORT}`);
  });
  scheduler.start({ immediate: config.CRAWL_ON_START });

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    log.info(`${signal} received, shutting down...`);
    scheduler.stop();
    server.close();
    await scheduler.whenIdle();
    if (redis) await closeRedisClient(redis);
    process.exit(0);
  };
  process.once("SIGINT", (signal) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  });
  process.once("SIGTERM", (signal) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  });
}

main().catch((err: unknown) => {
  logger.fatal({ err }, "[CORE] Failed to start");
  process.exit(1);
});
