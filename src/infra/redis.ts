import Redis from "ioredis";

import { scopedLogger } from "./logger";

const log = scopedLogger("INFRA", "REDIS");

export function createRedisClient(url: string): Redis {
  const client = new Redis(url, {
    lazyConnect: true, // Don't connect until the first command
    maxRetriesPerRequest: 2, // Fail reads fast so the cache can serve its last snapshot
    retryStrategy: (times) => {
      const delay = Math.min(times * 50, 2000);
      return delay;
    },
  });

  client.on("error", (err: Error) => {
    log.error({ err }, "Error");
  });

  client.on("connect", () => {
    log.info("Connected");
  });

  return client;
}

export async function closeRedisClient(client: Redis): Promise<void> {
  log.info("Closing connection...");
  await client.quit();
  log.info("Connection closed");
}
